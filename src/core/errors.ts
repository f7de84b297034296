/**
 * dosfetch 에러 정의
 * 모든 치명적 에러는 DosFetchError를 상속하며 종료 코드를 가집니다.
 */

export type DosFetchErrorCode =
  | 'INTEGRITY'
  | 'MISSING_DEPENDENCY'
  | 'MALFORMED_FILENAME'
  | 'PREEXISTING_DESTINATION'
  | 'NOT_FOUND'
  | 'FETCH_FAILED'
  | 'DISK_IMAGE_TOOL'
  | 'UNKNOWN_FLAVOR'
  | 'INVALID_CATALOG'
  | 'INVALID_REQUEST';

/**
 * 기본 에러 클래스
 */
export class DosFetchError extends Error {
  public readonly code: DosFetchErrorCode;
  public readonly exitCode: number;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: DosFetchErrorCode,
    context?: Record<string, unknown>,
    exitCode = 1
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.exitCode = exitCode;
    this.context = context;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * 체크섬 불일치
 */
export class IntegrityError extends DosFetchError {
  constructor(
    public readonly filePath: string,
    public readonly actual: string,
    public readonly expected: string
  ) {
    super(
      [
        `체크섬 불일치: ${filePath}`,
        `  실제 값: ${actual}`,
        `  예상 값: ${expected}`,
        `파일이 손상되었을 수 있습니다. 파일을 삭제한 뒤 다시 시도하세요: rm "${filePath}"`,
      ].join('\n'),
      'INTEGRITY',
      { filePath, actual, expected }
    );
  }
}

/**
 * 필수 외부 도구 없음
 */
export class MissingDependencyError extends DosFetchError {
  constructor(public readonly command: string, hint: string) {
    super(
      `'${command}' 명령을 PATH에서 찾을 수 없습니다. ${hint}`,
      'MISSING_DEPENDENCY',
      { command }
    );
  }
}

/**
 * 디스크 번호 패턴을 해석할 수 없는 파일명
 */
export class MalformedFilenameError extends DosFetchError {
  constructor(public readonly filename: string, reason: string) {
    super(`디스크 파일명을 해석할 수 없습니다: ${filename} (${reason})`, 'MALFORMED_FILENAME', {
      filename,
    });
  }
}

/**
 * 이미 내용이 있는 설치 대상 디렉토리
 */
export class PreexistingDestinationError extends DosFetchError {
  constructor(public readonly destination: string) {
    super(
      `대상 디렉토리가 비어 있지 않습니다: ${destination}\n다른 디렉토리를 지정하세요.`,
      'PREEXISTING_DESTINATION',
      { destination }
    );
  }
}

/**
 * 원격 리소스 없음 (HTTP 404)
 */
export class NotFoundError extends DosFetchError {
  constructor(public readonly url: string) {
    super(`리소스를 찾을 수 없습니다: ${url}`, 'NOT_FOUND', { url });
  }
}

/**
 * 404 이외의 전송 실패
 */
export class FetchError extends DosFetchError {
  constructor(public readonly url: string, cause: string, public readonly status?: number) {
    super(`다운로드 실패: ${url} (${cause})`, 'FETCH_FAILED', { url, status });
  }
}

/**
 * 디스크 이미지 도구 실행 실패
 */
export class DiskImageToolError extends DosFetchError {
  constructor(
    public readonly command: string,
    public readonly exitStatus: number | null,
    stderr: string
  ) {
    const detail = stderr.trim() ? `\n${stderr.trim()}` : '';
    super(
      `'${command}' 실행 실패 (종료 코드: ${exitStatus ?? '알 수 없음'})${detail}`,
      'DISK_IMAGE_TOOL',
      { command, exitStatus }
    );
  }
}

/**
 * 카탈로그에 없는 배포판
 */
export class UnknownFlavorError extends DosFetchError {
  constructor(public readonly flavor: string, known: readonly string[]) {
    super(
      `알 수 없는 배포판: ${flavor} (지원: ${known.join(', ')})`,
      'UNKNOWN_FLAVOR',
      { flavor }
    );
  }
}

/**
 * 카탈로그 데이터 형식 오류
 */
export class InvalidCatalogError extends DosFetchError {
  constructor(reason: string) {
    super(`배포판 카탈로그 형식이 잘못되었습니다: ${reason}`, 'INVALID_CATALOG');
  }
}

export function isDosFetchError(error: unknown): error is DosFetchError {
  return error instanceof DosFetchError;
}
