import * as fs from 'fs-extra';
import * as path from 'path';
import * as os from 'os';

// 설정 인터페이스 정의
export interface Config {
  // 설치 기본값
  defaultFlavor: string;
  defaultDestination: string;

  // 다운로드 설정
  mirrorUrl?: string; // 카탈로그 기본 URL의 미러 루트 대체
  requestTimeoutMs: number;

  // 외부 도구
  diskImageTool: string;

  // 기타 설정
  logLevel: string;
}

export type ConfigKey = keyof Config;

const CONFIG_KEYS: readonly ConfigKey[] = [
  'defaultFlavor',
  'defaultDestination',
  'mirrorUrl',
  'requestTimeoutMs',
  'diskImageTool',
  'logLevel',
];

const LOG_LEVELS = ['error', 'warn', 'info', 'debug'];

export function isConfigKey(key: string): key is ConfigKey {
  return (CONFIG_KEYS as readonly string[]).includes(key);
}

export class ConfigManager {
  private configDir: string;
  private configPath: string;
  private logsDir: string;

  constructor(configDir: string = process.env.DOSFETCH_HOME || path.join(os.homedir(), '.dosfetch')) {
    this.configDir = configDir;
    this.configPath = path.join(this.configDir, 'settings.json');
    this.logsDir = path.join(this.configDir, 'logs');
  }

  /**
   * 기본 설정값 (DOSFETCH_DEST 환경 변수가 기본 설치 경로를 대체)
   */
  getDefaults(): Config {
    return {
      defaultFlavor: 'freedos-1.3',
      defaultDestination: process.env.DOSFETCH_DEST || path.join(this.configDir, 'drive_c'),
      requestTimeoutMs: 300000,
      diskImageTool: 'mcopy',
      logLevel: 'info',
    };
  }

  /**
   * 필요한 디렉토리들을 생성합니다.
   */
  async ensureDirectories(): Promise<void> {
    await fs.ensureDir(this.configDir);
    await fs.ensureDir(this.logsDir);
  }

  /**
   * 설정 디렉토리 경로를 반환합니다.
   */
  getConfigDir(): string {
    return this.configDir;
  }

  /**
   * 설정 파일 경로를 반환합니다.
   */
  getConfigPath(): string {
    return this.configPath;
  }

  /**
   * 로그 디렉토리 경로를 반환합니다.
   */
  getLogsDir(): string {
    return this.logsDir;
  }

  /**
   * 설정을 동기적으로 로드합니다.
   * 저장된 설정과 기본값을 병합하고, 타입이 맞지 않는 값은 기본값을 사용합니다.
   */
  getConfig(): Config {
    const defaults = this.getDefaults();
    const raw = this.readRaw();

    const config: Config = {
      defaultFlavor: typeof raw.defaultFlavor === 'string' ? raw.defaultFlavor : defaults.defaultFlavor,
      defaultDestination:
        typeof raw.defaultDestination === 'string' ? raw.defaultDestination : defaults.defaultDestination,
      requestTimeoutMs:
        typeof raw.requestTimeoutMs === 'number' && raw.requestTimeoutMs > 0
          ? raw.requestTimeoutMs
          : defaults.requestTimeoutMs,
      diskImageTool: typeof raw.diskImageTool === 'string' ? raw.diskImageTool : defaults.diskImageTool,
      logLevel:
        typeof raw.logLevel === 'string' && LOG_LEVELS.includes(raw.logLevel)
          ? raw.logLevel
          : defaults.logLevel,
    };

    if (typeof raw.mirrorUrl === 'string' && raw.mirrorUrl) {
      config.mirrorUrl = raw.mirrorUrl;
    }

    return config;
  }

  /**
   * 설정값을 동기적으로 설정합니다 (CLI용).
   */
  set(key: string, value: unknown): void {
    if (!isConfigKey(key)) {
      throw new Error(`알 수 없는 설정 키: ${key} (사용 가능: ${CONFIG_KEYS.join(', ')})`);
    }

    const config = this.readRaw();
    config[key] = value;
    fs.ensureDirSync(this.configDir);
    fs.writeJsonSync(this.configPath, config, { spaces: 2 });
  }

  /**
   * 설정을 동기적으로 초기화합니다 (CLI용).
   */
  reset(): void {
    fs.ensureDirSync(this.configDir);
    fs.writeJsonSync(this.configPath, this.getDefaults(), { spaces: 2 });
  }

  /**
   * settings.json 원본 읽기 (없거나 손상된 경우 빈 객체)
   */
  private readRaw(): Record<string, unknown> {
    try {
      if (fs.pathExistsSync(this.configPath)) {
        const parsed: unknown = fs.readJsonSync(this.configPath);
        if (parsed && typeof parsed === 'object' && !Array.isArray(parsed)) {
          return Object.fromEntries(Object.entries(parsed));
        }
      }
    } catch (error) {
      console.error('설정 파일 로드 실패, 기본값 사용:', error instanceof Error ? error.message : String(error));
    }
    return {};
  }
}

// 싱글톤 인스턴스
let configManagerInstance: ConfigManager | null = null;

export function getConfigManager(): ConfigManager {
  if (!configManagerInstance) {
    configManagerInstance = new ConfigManager();
  }
  return configManagerInstance;
}
