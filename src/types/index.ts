// ============================================
// 서명 스킴 관련 타입
// ============================================

/** 활성화된 서명 스킴 (V1은 항상 활성) */
export interface SchemeFlags {
  v1: true;
  v2: boolean;
  v3: boolean;
}

/** 다이제스트 레코드 종류 */
export type SchemeKind = 'V1' | 'V2V3';

/** 변형 하나의 스킴별 다이제스트 레코드 */
export interface DigestRecord {
  variantName: string;
  schemeKind: SchemeKind;
  payload: string;
}

/** 변형 하나에 대한 레코드 그룹 (V1 다음 V2V3 순서) */
export interface VariantDigestGroup {
  variantName: string;
  v1: string;
  v2v3?: string;
}

// ============================================
// 전송 파일 관련 타입
// ============================================

/** 전송 파일 헤더 */
export interface TransferHeader {
  /** 포맷 버전 (semver, 빌드 메타데이터 제외) */
  version: string;
  /** 번들 파일의 SHA-256 (hex). 구버전 파일에는 없음 */
  bundleDigest?: string;
}

/** 파싱된 전송 파일 */
export interface TransferFile {
  header: TransferHeader;
  flags: SchemeFlags;
  groups: VariantDigestGroup[];
}

// ============================================
// 서명자 관련 타입
// ============================================

/** 서명자 설정 (개인키와 인증서 체인) */
export interface SignerConfig {
  /** V1 서명 파일 basename (예: CERT) */
  name: string;
  /** PKCS#8 PEM 개인키 */
  privateKeyPem: string;
  /** DER 인코딩 인증서 체인 (첫 번째가 서명자 인증서) */
  certificates: Buffer[];
}

/** 다이제스트 생성 옵션 */
export interface DigestOptions {
  schemes: SchemeFlags;
  minSdkVersion?: number;
  maxSdkVersion?: number;
  debuggableApkPermitted: boolean;
}

// ============================================
// APK Set 관련 타입
// ============================================

/** APK Set 빌드 모드 */
export type ApkSetMode = 'split' | 'universal';

/** APK Set에서 추출된 변형 */
export interface ExtractedVariant {
  /** 경로 구분자를 '_'로 바꾼 변형 이름 (두 단계 사이의 상관 키) */
  name: string;
  /** 아카이브 내부 경로 */
  entryPath: string;
  /** 작업 디렉토리에 추출된 파일 경로 */
  filePath: string;
}

/** 변형 하나의 처리 완료 이벤트 */
export interface VariantProgressEvent {
  apkSet: ApkSetMode;
  variant: string;
  /** APK Set 안에서의 순번 (0부터) */
  index: number;
  /** 서명 적용 단계에서 기록한 파일 */
  outputPath?: string;
}
