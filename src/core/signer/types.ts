import { DigestOptions, SchemeFlags, SignerConfig } from '../../types';

/**
 * 서명 스킴 구현 (다이제스트 페이로드 생성/적용)
 *
 * 페이로드는 전송 파일 한 줄에 들어가야 하므로 줄바꿈과 '.apk'를 포함하지 않는 문자열입니다.
 */
export interface Signer {
  /** 추출된 APK의 V1 페이로드 */
  generateV1Payload(apk: string, signers: SignerConfig[], options: DigestOptions): Promise<string>;

  /** V1 페이로드를 넣은 APK를 outputApk에 기록 */
  applyV1Payload(apk: string, payload: string, outputApk: string, schemes: SchemeFlags): Promise<void>;

  /** V1 서명된 APK의 V2/V3 페이로드 */
  generateV2V3Payload(
    v1SignedApk: string,
    signers: SignerConfig[],
    options: DigestOptions
  ): Promise<string>;

  /** V2/V3 페이로드를 넣은 APK를 outputApk에 기록 */
  applyV2V3Payload(
    v1SignedApk: string,
    payload: string,
    outputApk: string,
    schemes: SchemeFlags
  ): Promise<void>;
}
