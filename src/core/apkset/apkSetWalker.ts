import * as fs from 'fs-extra';
import type { Entry } from 'yauzl';
import { ExtractedVariant } from '../../types';
import { ApkSetIOError, errorMessage } from '../errors';
import { ZipReader, isDirectoryEntry } from '../zip/zipReader';
import { isApkEntry, toVariantName } from '../shared/variant-names';
import { resolveArchivePath, toUnixPath } from '../shared/path-utils';
import { writeStreamToFile } from '../shared/file-utils';
import logger from '../../utils/logger';

/**
 * APK Set 아카이브를 엔트리 순서대로 순회하며 APK 엔트리를 workDir 아래로 추출합니다.
 *
 * - 아카이브 내부 디렉토리 구조를 유지하므로 설정별로 같은 파일명을 가진 APK가 충돌하지 않습니다.
 * - APK가 아닌 엔트리는 읽지 않고 건너뜁니다.
 * - 다음 엔트리는 소비자가 현재 변형 처리를 마친 뒤에야 읽습니다.
 * - 열기/추출 실패 시 ApkSetIOError로 순회 전체를 중단합니다.
 * - 순회를 중간에 멈추면(break) 아카이브를 닫습니다.
 */
export async function* walkApkSet(
  apkSetPath: string,
  workDir: string
): AsyncGenerator<ExtractedVariant> {
  let reader: ZipReader;
  try {
    reader = await ZipReader.open(apkSetPath);
  } catch (error) {
    throw new ApkSetIOError(`APK Set을 열 수 없습니다: ${apkSetPath} (${errorMessage(error)})`, {
      cause: error,
    });
  }

  try {
    await fs.ensureDir(workDir);
    const entries = reader.entries();

    while (true) {
      let next: IteratorResult<Entry>;
      try {
        next = await entries.next();
      } catch (error) {
        throw new ApkSetIOError(`APK Set 읽기 실패: ${apkSetPath} (${errorMessage(error)})`, {
          cause: error,
        });
      }
      if (next.done) break;

      const entry = next.value;
      if (isDirectoryEntry(entry) || !isApkEntry(entry.fileName)) {
        logger.debug('APK가 아닌 엔트리 건너뜀', { entry: entry.fileName });
        continue;
      }

      const entryPath = toUnixPath(entry.fileName);
      let filePath: string;
      try {
        filePath = resolveArchivePath(workDir, entryPath);
        await writeStreamToFile(await reader.openReadStream(entry), filePath);
      } catch (error) {
        throw new ApkSetIOError(`APK 추출 실패: ${entryPath} (${errorMessage(error)})`, {
          cause: error,
        });
      }

      const variant: ExtractedVariant = {
        name: toVariantName(entryPath),
        entryPath,
        filePath,
      };
      logger.debug('APK 추출 완료', { variant: variant.name, filePath });
      yield variant;
    }
  } finally {
    reader.close();
  }
}
