/**
 * 번들 서명 에러 코드
 */
export const ErrorCodes = {
  /** 옵션 누락/충돌 */
  PARAMETER: 'E_PARAMETER',
  /** 최소 SDK 버전을 결정할 수 없음 */
  MIN_SDK_VERSION: 'E_MIN_SDK_VERSION',
  /** 전송 파일 형식 오류 */
  TRANSFER_FORMAT: 'E_TRANSFER_FORMAT',
  /** 변형 이름이 전송 파일과 대응되지 않음 */
  VARIANT_CORRELATION: 'E_VARIANT_CORRELATION',
  /** 전송 파일이 다른 번들에서 생성됨 */
  BUNDLE_MISMATCH: 'E_BUNDLE_MISMATCH',
  /** 기록된 다이제스트와 재빌드된 APK 내용이 다름 */
  DIGEST_MISMATCH: 'E_DIGEST_MISMATCH',
  /** 서명 계산 실패 */
  SIGNER: 'E_SIGNER',
  /** APK Set 읽기/추출 실패 */
  APK_SET_IO: 'E_APK_SET_IO',
  /** 번들 구조 오류 */
  INVALID_BUNDLE: 'E_INVALID_BUNDLE',
  /** 번들 확장(bundletool) 입출력 오류 */
  BUNDLE_EXPANSION_IO: 'E_BUNDLE_EXPANSION_IO',
  /** 잘못된 APK */
  APK_FORMAT: 'E_APK_FORMAT',
  /** 임시 디렉토리 정리 실패 */
  WORKSPACE_CLEANUP: 'E_WORKSPACE_CLEANUP',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * 에러 코드별 프로세스 종료 코드
 */
export const ErrorExitCodes: Record<ErrorCode, number> = {
  [ErrorCodes.PARAMETER]: 2,
  [ErrorCodes.MIN_SDK_VERSION]: 3,
  [ErrorCodes.TRANSFER_FORMAT]: 4,
  [ErrorCodes.VARIANT_CORRELATION]: 4,
  [ErrorCodes.BUNDLE_MISMATCH]: 4,
  [ErrorCodes.DIGEST_MISMATCH]: 4,
  [ErrorCodes.SIGNER]: 4,
  [ErrorCodes.APK_SET_IO]: 4,
  [ErrorCodes.INVALID_BUNDLE]: 5,
  [ErrorCodes.BUNDLE_EXPANSION_IO]: 6,
  [ErrorCodes.APK_FORMAT]: 7,
  [ErrorCodes.WORKSPACE_CLEANUP]: 8,
};

/** 분류되지 않은 런타임 오류 */
export const UNCLASSIFIED_EXIT_CODE = 4;

export class BundleSignerError extends Error {
  readonly code: ErrorCode;
  readonly exitCode: number;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'BundleSignerError';
    this.code = code;
    this.exitCode = ErrorExitCodes[code];
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ParameterError extends BundleSignerError {
  constructor(message: string) {
    super(ErrorCodes.PARAMETER, message);
    this.name = 'ParameterError';
  }
}

export class MinSdkVersionError extends BundleSignerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ErrorCodes.MIN_SDK_VERSION, message, options);
    this.name = 'MinSdkVersionError';
  }
}

/**
 * 전송 파일 파싱 실패. line은 1부터 시작 (EOF 오류는 마지막 줄 번호 + 1)
 */
export class TransferFileFormatError extends BundleSignerError {
  readonly line: number;

  constructor(message: string, line: number) {
    super(ErrorCodes.TRANSFER_FORMAT, `전송 파일 형식 오류 (${line}번째 줄): ${message}`);
    this.name = 'TransferFileFormatError';
    this.line = line;
  }
}

export class VariantCorrelationError extends BundleSignerError {
  readonly variantName: string;

  constructor(variantName: string, message: string) {
    super(ErrorCodes.VARIANT_CORRELATION, message);
    this.name = 'VariantCorrelationError';
    this.variantName = variantName;
  }
}

export class BundleMismatchError extends BundleSignerError {
  constructor(expected: string, actual: string) {
    super(
      ErrorCodes.BUNDLE_MISMATCH,
      `전송 파일이 다른 번들에서 생성되었습니다 (기록: ${expected}, 현재: ${actual})`
    );
    this.name = 'BundleMismatchError';
  }
}

export class DigestMismatchError extends BundleSignerError {
  constructor(message: string) {
    super(ErrorCodes.DIGEST_MISMATCH, message);
    this.name = 'DigestMismatchError';
  }
}

export class SignerError extends BundleSignerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ErrorCodes.SIGNER, message, options);
    this.name = 'SignerError';
  }
}

export class ApkSetIOError extends BundleSignerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ErrorCodes.APK_SET_IO, message, options);
    this.name = 'ApkSetIOError';
  }
}

export class InvalidBundleError extends BundleSignerError {
  constructor(message: string) {
    super(ErrorCodes.INVALID_BUNDLE, message);
    this.name = 'InvalidBundleError';
  }
}

export class BundleExpansionIOError extends BundleSignerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ErrorCodes.BUNDLE_EXPANSION_IO, message, options);
    this.name = 'BundleExpansionIOError';
  }
}

export class ApkFormatError extends BundleSignerError {
  constructor(message: string) {
    super(ErrorCodes.APK_FORMAT, message);
    this.name = 'ApkFormatError';
  }
}

export class WorkspaceCleanupError extends BundleSignerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ErrorCodes.WORKSPACE_CLEANUP, message, options);
    this.name = 'WorkspaceCleanupError';
  }
}

/**
 * 임의의 throw 값을 종료 코드로 변환
 */
export function exitCodeFor(error: unknown): number {
  if (error instanceof BundleSignerError) {
    return error.exitCode;
  }
  return UNCLASSIFIED_EXIT_CODE;
}

/**
 * 임의의 throw 값에서 메시지 추출
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
