import * as winston from 'winston';
import * as fs from 'fs';
import * as path from 'path';
import { PhaseTiming, RunSummary } from './types';

export interface PipelineLoggerOptions {
  level?: string;
  /** Directory for the JSON log file and run summary; console only when null. */
  logDir?: string | null;
  silent?: boolean;
}

export type RunCounts = Omit<RunSummary, 'start_time' | 'end_time' | 'total_duration_ms' | 'detailed_timings'>;

export class PipelineLogger {
  private logger: winston.Logger;
  private summaryFile: string | null = null;
  private startTime: number;
  private phaseStarts = new Map<string, number>();
  private timings: PhaseTiming[] = [];

  constructor(runId: string, options: PipelineLoggerOptions = {}) {
    const consoleTransport = new winston.transports.Console({
      format: winston.format.combine(winston.format.colorize(), winston.format.simple()),
    });
    let fileTransport: winston.Logger['transports'][number] | null = null;

    if (options.logDir) {
      if (!fs.existsSync(options.logDir)) {
        fs.mkdirSync(options.logDir, { recursive: true });
      }
      fileTransport = new winston.transports.File({ filename: path.join(options.logDir, `${runId}.log`) });
      this.summaryFile = path.join(options.logDir, `summary_${runId}.json`);
    }

    this.logger = winston.createLogger({
      level: options.level ?? 'info',
      silent: options.silent ?? false,
      defaultMeta: { run_id: runId },
      format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
      transports: fileTransport ? [consoleTransport, fileTransport] : [consoleTransport],
    });

    this.startTime = Date.now();
  }

  public logPhaseStart(phase: string): void {
    this.phaseStarts.set(phase, Date.now());
    this.logger.info(`Phase started: ${phase}`, {
      phase,
      timestamp: Date.now() - this.startTime,
    });
  }

  public logPhaseEnd(phase: string, recordCount?: number): void {
    const started = this.phaseStarts.get(phase) ?? this.startTime;
    const duration = Date.now() - started;
    this.logger.info(`Phase completed: ${phase}`, {
      phase,
      duration_ms: duration,
      records: recordCount,
    });

    this.timings.push({
      phase,
      duration_ms: duration,
      records: recordCount,
      timestamp: new Date(),
    });
  }

  public info(message: string, meta?: Record<string, unknown>): void {
    this.logger.info(message, meta);
  }

  public warn(message: string, meta?: Record<string, unknown>): void {
    this.logger.warn(message, meta);
  }

  public logError(error: Error, context?: Record<string, unknown>): void {
    this.logger.error('Error occurred', {
      message: error.message,
      name: error.name,
      stack: error.stack,
      context,
      timestamp: Date.now() - this.startTime,
    });
  }

  public finalizeRun(counts: RunCounts): RunSummary {
    const endTime = new Date();
    const totalDuration = Date.now() - this.startTime;

    const summary: RunSummary = {
      ...counts,
      start_time: new Date(this.startTime),
      end_time: endTime,
      total_duration_ms: totalDuration,
      detailed_timings: [...this.timings],
    };

    if (this.summaryFile) {
      fs.writeFileSync(this.summaryFile, JSON.stringify(summary, null, 2));
    }

    this.logger.info('Metrics run completed', {
      processing_date: summary.processing_date,
      total_duration_seconds: (totalDuration / 1000).toFixed(2),
      derived_rows: summary.derived_rows,
      history_inserted: summary.history_inserted,
      history_replaced: summary.history_replaced,
      trend_rows: summary.trend_rows,
      skipped_technologies: summary.skipped_technologies,
    });

    return summary;
  }
}
