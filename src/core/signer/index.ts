export * from './types';
export { ApkSchemeSigner } from './apkSchemeSigner';
export { verifyApk, MIN_SDK_WITH_V2 } from './apkVerifier';
export type { ApkVerificationResult, VerifyOptions } from './apkVerifier';
export { describeCertificate } from './certificateInfo';
export type { CertificateSummary } from './certificateInfo';
export { loadSignerConfig, resolvePassword, toV1SignerName } from './credentials';
export type { SignerParams } from './credentials';
export {
  ANDROID_MANIFEST_ENTRY,
  minSdkVersionOf,
  readApkManifestInfo,
  readManifestInfo,
} from './androidManifest';
export type { ManifestInfo } from './androidManifest';
