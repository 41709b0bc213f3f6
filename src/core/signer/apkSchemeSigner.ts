import { DigestOptions, SchemeFlags, SignerConfig } from '../../types';
import { ParameterError, SignerError } from '../errors';
import logger from '../../utils/logger';
import { minSdkVersionOf, readApkManifestInfo } from './androidManifest';
import { digestAlgorithmForMinSdk } from './jarManifest';
import { Signer } from './types';
import { applyV1Payload, generateV1Payload } from './v1Scheme';
import { applyV2V3Payload, generateV2V3Payload } from './v2v3Scheme';

/**
 * JAR 서명(V1)과 APK Signature Scheme v2/v3를 직접 구현한 서명자
 *
 * RSA 키만 지원하며 V2/V3 서명 알고리즘은 RSASSA-PKCS1-v1_5 / SHA-256입니다.
 */
export class ApkSchemeSigner implements Signer {
  async generateV1Payload(
    apk: string,
    signers: SignerConfig[],
    options: DigestOptions
  ): Promise<string> {
    requireSigners(signers);
    const minSdkVersion = await this.resolveMinSdk(apk, options);
    const algorithm = digestAlgorithmForMinSdk(minSdkVersion);
    logger.debug('V1 페이로드 생성', { apk, minSdkVersion, algorithm });
    return generateV1Payload(apk, signers, algorithm, options.schemes);
  }

  async applyV1Payload(
    apk: string,
    payload: string,
    outputApk: string,
    schemes: SchemeFlags
  ): Promise<void> {
    await applyV1Payload(apk, payload, outputApk, schemes);
  }

  async generateV2V3Payload(
    v1SignedApk: string,
    signers: SignerConfig[],
    options: DigestOptions
  ): Promise<string> {
    requireSigners(signers);
    if (!options.schemes.v2 && !options.schemes.v3) {
      throw new SignerError('v2/v3가 모두 비활성인데 V2/V3 페이로드를 요청했습니다');
    }
    return generateV2V3Payload(v1SignedApk, signers, options.schemes);
  }

  async applyV2V3Payload(
    v1SignedApk: string,
    payload: string,
    outputApk: string,
    schemes: SchemeFlags
  ): Promise<void> {
    await applyV2V3Payload(v1SignedApk, payload, outputApk, schemes);
  }

  /**
   * 지정된 최소 SDK가 없으면 매니페스트에서 읽고, debuggable APK 허용 여부를 확인
   */
  private async resolveMinSdk(apk: string, options: DigestOptions): Promise<number> {
    const info = await readApkManifestInfo(apk);
    if (info.debuggable && !options.debuggableApkPermitted) {
      throw new SignerError(
        `debuggable APK는 서명하지 않습니다: ${apk} (--debuggable-apk-permitted로 허용)`
      );
    }
    return options.minSdkVersion ?? minSdkVersionOf(info);
  }
}

function requireSigners(signers: SignerConfig[]): void {
  if (signers.length === 0) {
    throw new ParameterError('서명자 설정이 없습니다');
  }
}
