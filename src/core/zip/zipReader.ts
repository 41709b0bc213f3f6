import * as yauzl from 'yauzl';
import type { Readable } from 'stream';

/**
 * yauzl 기반 ZIP 리더
 *
 * 중앙 디렉토리만 먼저 읽고 엔트리 데이터는 필요할 때 스트림으로 엽니다.
 * 엔트리 순회는 한 번만 가능합니다.
 */
export class ZipReader {
  private iterated = false;

  private constructor(
    private readonly zipfile: yauzl.ZipFile,
    readonly filePath: string
  ) {}

  static open(filePath: string): Promise<ZipReader> {
    return new Promise((resolve, reject) => {
      yauzl.open(filePath, { lazyEntries: true, autoClose: false }, (err, zipfile) => {
        if (err || !zipfile) {
          reject(err ?? new Error(`ZIP 파일을 열 수 없습니다: ${filePath}`));
          return;
        }
        resolve(new ZipReader(zipfile, filePath));
      });
    });
  }

  /**
   * 엔트리를 아카이브 순서대로 하나씩 읽습니다.
   */
  async *entries(): AsyncGenerator<yauzl.Entry> {
    if (this.iterated) {
      throw new Error('ZIP 엔트리는 한 번만 순회할 수 있습니다');
    }
    this.iterated = true;

    let entry = await this.nextEntry();
    while (entry) {
      yield entry;
      entry = await this.nextEntry();
    }
  }

  openReadStream(entry: yauzl.Entry): Promise<Readable> {
    return new Promise((resolve, reject) => {
      this.zipfile.openReadStream(entry, (err, stream) => {
        if (err || !stream) {
          reject(err ?? new Error(`엔트리를 열 수 없습니다: ${entry.fileName}`));
          return;
        }
        resolve(stream);
      });
    });
  }

  async readBuffer(entry: yauzl.Entry): Promise<Buffer> {
    const stream = await this.openReadStream(entry);
    const chunks: Buffer[] = [];
    for await (const chunk of stream) {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
    }
    return Buffer.concat(chunks);
  }

  close(): void {
    if (this.zipfile.isOpen) {
      this.zipfile.close();
    }
  }

  private nextEntry(): Promise<yauzl.Entry | null> {
    return new Promise((resolve, reject) => {
      const cleanup = () => {
        this.zipfile.removeListener('entry', onEntry);
        this.zipfile.removeListener('end', onEnd);
        this.zipfile.removeListener('error', onError);
      };
      const onEntry = (entry: yauzl.Entry) => {
        cleanup();
        resolve(entry);
      };
      const onEnd = () => {
        cleanup();
        resolve(null);
      };
      const onError = (err: Error) => {
        cleanup();
        reject(err);
      };

      this.zipfile.on('entry', onEntry);
      this.zipfile.on('end', onEnd);
      this.zipfile.on('error', onError);
      this.zipfile.readEntry();
    });
  }
}

/**
 * 디렉토리 엔트리 여부
 */
export function isDirectoryEntry(entry: yauzl.Entry): boolean {
  return /\/$/.test(entry.fileName);
}
