// 공통 모듈 진입점

// 변형 이름
export {
  APK_MARKER,
  isApkEntry,
  toVariantName,
  leafName,
  isUniversalVariant,
  toOutputFileName,
  bundleBaseName,
} from './variant-names';

// 경로 유틸리티
export { toUnixPath, resolveArchivePath } from './path-utils';

// 파일 유틸리티
export { sha256File, writeStreamToFile, digestStream, isFile } from './file-utils';
