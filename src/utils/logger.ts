import * as winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import { getConfigManager } from '../core/config';

// 개발 모드 여부
const isDev = process.env.NODE_ENV === 'development';

// 로그 포맷 정의
const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.printf(({ timestamp, level, message, stack, ...meta }) => {
    let log = `[${timestamp}] [${level.toUpperCase()}] ${message}`;
    if (Object.keys(meta).length > 0) {
      log += ` ${JSON.stringify(meta)}`;
    }
    if (stack) {
      log += `\n${stack}`;
    }
    return log;
  })
);

// 콘솔용 컬러 포맷
const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'HH:mm:ss' }),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    let log = `[${timestamp}] ${level}: ${message}`;
    if (Object.keys(meta).length > 0) {
      log += ` ${JSON.stringify(meta)}`;
    }
    return log;
  })
);

// 경고와 에러는 stderr로 출력
function createConsoleTransport(): winston.transport {
  return new winston.transports.Console({
    format: consoleFormat,
    stderrLevels: ['error', 'warn'],
  });
}

// 초기화 전, flush 후에 쓰는 콘솔 전용 로거
function createConsoleLogger(): winston.Logger {
  return winston.createLogger({
    level: process.env.DOSFETCH_LOG_LEVEL || 'info',
    format: logFormat,
    transports: [createConsoleTransport()],
  });
}

class Logger {
  private logger: winston.Logger;
  private initialized = false;

  constructor() {
    this.logger = createConsoleLogger();
  }

  get isInitialized(): boolean {
    return this.initialized;
  }

  /**
   * 로거를 초기화합니다. ConfigManager에서 로그 경로와 레벨을 가져옵니다.
   */
  async initialize(): Promise<void> {
    if (this.initialized) return;

    const configManager = getConfigManager();
    await configManager.ensureDirectories();
    const logsDir = configManager.getLogsDir();
    const { logLevel } = configManager.getConfig();
    const level = isDev ? 'debug' : logLevel;

    // 파일 로테이션 트랜스포트 설정
    const fileTransport = new DailyRotateFile({
      dirname: logsDir,
      filename: 'app-%DATE%.log',
      datePattern: 'YYYY-MM-DD',
      maxSize: '20m',
      maxFiles: '30d', // 30일 보관
      format: logFormat,
    });

    // 에러 전용 파일 트랜스포트
    const errorFileTransport = new DailyRotateFile({
      dirname: logsDir,
      filename: 'error-%DATE%.log',
      datePattern: 'YYYY-MM-DD',
      maxSize: '20m',
      maxFiles: '30d',
      level: 'error',
      format: logFormat,
    });

    // CLI 도구이므로 콘솔 출력은 항상 유지
    const transports: winston.transport[] = [fileTransport, errorFileTransport, createConsoleTransport()];

    // 로거 재설정
    this.logger = winston.createLogger({
      level,
      format: logFormat,
      transports,
    });

    this.initialized = true;
    this.debug('로거 초기화 완료', { logsDir, level });
  }

  /**
   * 에러 로그
   */
  error(message: string, meta?: Record<string, unknown>): void {
    this.logger.error(message, meta);
  }

  /**
   * 경고 로그
   */
  warn(message: string, meta?: Record<string, unknown>): void {
    this.logger.warn(message, meta);
  }

  /**
   * 정보 로그
   */
  info(message: string, meta?: Record<string, unknown>): void {
    this.logger.info(message, meta);
  }

  /**
   * 디버그 로그
   */
  debug(message: string, meta?: Record<string, unknown>): void {
    this.logger.debug(message, meta);
  }

  /**
   * 에러 객체를 로깅합니다. Error가 아닌 값은 문자열로 기록합니다.
   */
  logError(error: unknown, context?: string): void {
    const message = error instanceof Error ? error.message : String(error);
    const meta = error instanceof Error ? { stack: error.stack, name: error.name } : {};
    this.error(context ? `${context}: ${message}` : message, meta);
  }

  /**
   * 남은 로그를 파일에 기록하고 트랜스포트를 닫습니다.
   * process.exit 전에 호출하며, 이후 로그는 콘솔로만 출력됩니다.
   */
  async flush(): Promise<void> {
    const current = this.logger;
    this.logger = createConsoleLogger();
    this.initialized = false;

    await new Promise<void>((resolve) => {
      current.once('finish', () => resolve());
      current.end();
    });
  }
}

// 싱글톤 인스턴스
const logger = new Logger();

export { logger, Logger };
export default logger;
