import archiver from 'archiver';
import * as fs from 'fs-extra';
import * as path from 'path';

/** 모든 엔트리에 기록하는 고정 수정 시각 */
const FIXED_ENTRY_DATE = new Date(Date.UTC(2008, 0, 1, 0, 0, 0));

export interface ZipEntrySource {
  name: string;
  data: Buffer;
  /** true면 무압축(STORED), 아니면 DEFLATE */
  store: boolean;
}

/**
 * 테스트 픽스처용 ZIP 생성: 엔트리를 주어진 순서대로 기록
 */
export async function writeZip(
  outputPath: string,
  entries: ZipEntrySource[],
  compressionLevel = 9
): Promise<void> {
  await fs.ensureDir(path.dirname(outputPath));

  return new Promise((resolve, reject) => {
    const output = fs.createWriteStream(path.resolve(outputPath));
    const archive = archiver('zip', {
      zlib: { level: compressionLevel },
    });

    output.on('close', () => resolve());
    output.on('error', (err) => reject(err));
    archive.on('error', (err) => reject(err));

    archive.pipe(output);
    for (const entry of entries) {
      archive.append(entry.data, {
        name: entry.name,
        date: FIXED_ENTRY_DATE,
        store: entry.store,
      });
    }
    archive.finalize().catch(reject);
  });
}
