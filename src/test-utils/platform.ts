/// <reference types="vitest/globals" />

/**
 * 플랫폼별 테스트 유틸리티
 */

export const isWindows = process.platform === 'win32';

/**
 * 실행 권한 비트가 있는 Unix 계열에서만 테스트 실행
 */
export const itOnUnix = !isWindows ? it : it.skip;
