import winston from 'winston';
import chalk from 'chalk';
import * as fs from 'node:fs';
import * as path from 'node:path';
import type { SnapshotStage, SnapshotWarning } from '../types';

const STAGE_COLORS: Record<SnapshotStage, (text: string) => string> = {
  walk: chalk.cyan,
  render: chalk.magenta,
  extract: chalk.green,
  dependencies: chalk.blue,
  report: chalk.yellow,
};

function isStage(value: unknown): value is SnapshotStage {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(STAGE_COLORS, value);
}

const customFormat = winston.format.printf(({ level, message, timestamp, stage }) => {
  const ts = chalk.gray(`[${timestamp}]`);
  const stageTag = isStage(stage) ? `${STAGE_COLORS[stage](`[${stage}]`)} ` : '';
  return `${ts} ${level} ${stageTag}${message}`;
});

const logger = winston.createLogger({
  level: process.env.CODESNAP_LOG_LEVEL ?? 'info',
  format: winston.format.combine(
    winston.format.timestamp({ format: 'HH:mm:ss' }),
    winston.format.colorize(),
    customFormat,
  ),
  transports: [
    new winston.transports.Console(),
  ],
});

export function addFileTransport(outputDir: string): void {
  const logDir = path.join(outputDir, 'logs');
  if (!fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true });
  }

  logger.add(
    new winston.transports.File({
      filename: path.join(logDir, 'codesnap-error.log'),
      level: 'error',
      maxsize: 5 * 1024 * 1024,
      maxFiles: 3,
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.json(),
      ),
    }),
  );
  logger.add(
    new winston.transports.File({
      filename: path.join(logDir, 'codesnap-combined.log'),
      maxsize: 10 * 1024 * 1024,
      maxFiles: 5,
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.json(),
      ),
    }),
  );
}

export function setLogLevel(level: string): void {
  logger.level = level;
}

export function stageLog(
  stage: SnapshotStage,
  message: string,
  level: string = 'info',
): void {
  logger.log({ level, message, stage });
}

export function warningLog(warning: SnapshotWarning): void {
  const subject = warning.type === 'read' ? warning.path : warning.library;
  logger.debug(`[${warning.type}] ${subject}: ${warning.message}`);
}

export default logger;
