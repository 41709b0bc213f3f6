import { ParameterError } from '../core/errors';
import { SignerParams } from '../core/signer/credentials';

/** 서명자 선택 옵션 (genbin) */
export interface SignerOptions {
  ks?: string;
  ksKeyAlias?: string;
  ksPass?: string;
  keyPass?: string;
  key?: string;
  cert?: string;
  v1SignerName?: string;
}

/**
 * 값이 생략 가능한 불리언 옵션 해석 (--flag, --flag true, --flag false)
 */
export function parseBooleanOption(value: boolean | string | undefined, flag: string): boolean {
  if (value === undefined || typeof value === 'boolean') {
    return value ?? false;
  }
  switch (value.toLowerCase()) {
    case 'true':
      return true;
    case 'false':
      return false;
    default:
      throw new ParameterError(`${flag} 값은 true 또는 false여야 합니다: ${value}`);
  }
}

/**
 * API 레벨 옵션 해석 (양의 정수)
 */
export function parseSdkVersionOption(value: string | undefined, flag: string): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (!/^\d+$/.test(value) || Number(value) < 1) {
    throw new ParameterError(`${flag} 값은 양의 정수여야 합니다: ${value}`);
  }
  return Number(value);
}

export function requireOption(value: string | undefined, description: string): string {
  if (!value) {
    throw new ParameterError(`${description}가 지정되지 않았습니다`);
  }
  return value;
}

export function toSignerParams(options: SignerOptions): SignerParams {
  return {
    ks: options.ks,
    ksKeyAlias: options.ksKeyAlias,
    ksPass: options.ksPass,
    keyPass: options.keyPass,
    key: options.key,
    cert: options.cert,
    v1SignerName: options.v1SignerName,
  };
}
