import * as fs from 'fs-extra';
import * as readline from 'readline';
import { SchemeFlags, TransferFile, TransferHeader, VariantDigestGroup } from '../../types';
import { TransferFileFormatError, VariantCorrelationError } from '../errors';
import { isNameLine, parseFlagsLine, parseVersionLine, requiresV2V3 } from './transferFormat';

/** 리더 상태 */
export type TransferReaderState =
  | 'expect-header'
  | 'expect-flags'
  | 'expect-name-or-eof'
  | 'expect-v1-digest'
  | 'expect-v2v3-digest';

/**
 * 전송 파일 리더 (상태 기계)
 *
 * expect-header → expect-flags → expect-name-or-eof ⇄ expect-v1-digest ⇄ expect-v2v3-digest
 *
 * 이름 줄 다음에는 V1 다이제스트가 정확히 한 줄 오고, v2/v3 중 하나라도 켜져 있으면
 * V2V3 다이제스트가 한 줄 더 와야 합니다.
 */
export class TransferFileReader {
  private state: TransferReaderState = 'expect-header';
  private lineNumber = 0;
  private header: TransferHeader | null = null;
  private flags: SchemeFlags | null = null;
  private readonly groups: VariantDigestGroup[] = [];
  private readonly names = new Set<string>();
  private pendingName = '';
  private pendingV1 = '';

  get currentState(): TransferReaderState {
    return this.state;
  }

  /**
   * 한 줄 입력 (줄바꿈 문자 제외)
   */
  feed(rawLine: string): void {
    this.lineNumber++;
    const line = rawLine.endsWith('\r') ? rawLine.slice(0, -1) : rawLine;
    if (line.length === 0) {
      throw this.formatError('빈 줄은 허용되지 않습니다');
    }

    switch (this.state) {
      case 'expect-header': {
        const header = parseVersionLine(line);
        if (typeof header === 'string') {
          throw this.formatError(header);
        }
        this.header = header;
        this.state = 'expect-flags';
        return;
      }

      case 'expect-flags': {
        const flags = parseFlagsLine(line);
        if (!flags) {
          throw this.formatError(`스킴 플래그 줄 형식이 아닙니다: ${line}`);
        }
        this.flags = flags;
        this.state = 'expect-name-or-eof';
        return;
      }

      case 'expect-name-or-eof': {
        if (!isNameLine(line)) {
          throw this.formatError('변형 이름이 와야 할 위치에 다이제스트가 있습니다');
        }
        if (this.names.has(line)) {
          throw new VariantCorrelationError(line, `전송 파일에 변형 이름이 중복됩니다: ${line}`);
        }
        this.pendingName = line;
        this.state = 'expect-v1-digest';
        return;
      }

      case 'expect-v1-digest': {
        if (isNameLine(line)) {
          throw this.formatError(`V1 다이제스트가 없습니다: ${this.pendingName}`);
        }
        if (requiresV2V3(this.requireFlags())) {
          this.pendingV1 = line;
          this.state = 'expect-v2v3-digest';
        } else {
          this.pushGroup({ variantName: this.pendingName, v1: line });
        }
        return;
      }

      case 'expect-v2v3-digest': {
        if (isNameLine(line)) {
          throw this.formatError(`V2/V3 다이제스트가 없습니다: ${this.pendingName}`);
        }
        this.pushGroup({ variantName: this.pendingName, v1: this.pendingV1, v2v3: line });
        return;
      }
    }
  }

  /**
   * 입력 종료. 그룹 중간에서 끝났으면 형식 오류
   */
  finish(): TransferFile {
    const eofLine = this.lineNumber + 1;
    switch (this.state) {
      case 'expect-header':
        throw new TransferFileFormatError('버전 줄이 없습니다', eofLine);
      case 'expect-flags':
        throw new TransferFileFormatError('스킴 플래그 줄이 없습니다', eofLine);
      case 'expect-v1-digest':
        throw new TransferFileFormatError(
          `V1 다이제스트 없이 파일이 끝났습니다: ${this.pendingName}`,
          eofLine
        );
      case 'expect-v2v3-digest':
        throw new TransferFileFormatError(
          `V2/V3 다이제스트 없이 파일이 끝났습니다: ${this.pendingName}`,
          eofLine
        );
      case 'expect-name-or-eof':
        break;
    }

    if (!this.header) {
      throw new TransferFileFormatError('버전 줄이 없습니다', eofLine);
    }
    return {
      header: this.header,
      flags: this.requireFlags(),
      groups: [...this.groups],
    };
  }

  private pushGroup(group: VariantDigestGroup): void {
    this.groups.push(group);
    this.names.add(group.variantName);
    this.pendingName = '';
    this.pendingV1 = '';
    this.state = 'expect-name-or-eof';
  }

  private requireFlags(): SchemeFlags {
    if (!this.flags) {
      throw this.formatError('스킴 플래그 줄이 없습니다');
    }
    return this.flags;
  }

  private formatError(message: string): TransferFileFormatError {
    return new TransferFileFormatError(message, this.lineNumber);
  }
}

/**
 * 문자열 전체를 전송 파일로 파싱
 */
export function parseTransferFile(text: string): TransferFile {
  const lines = text.split('\n');
  if (lines.length > 0 && lines[lines.length - 1] === '') {
    lines.pop();
  }
  const reader = new TransferFileReader();
  for (const line of lines) {
    reader.feed(line);
  }
  return reader.finish();
}

/**
 * 파일을 줄 단위로 스트리밍하며 파싱
 */
export async function readTransferFile(filePath: string): Promise<TransferFile> {
  const reader = new TransferFileReader();
  const input = fs.createReadStream(filePath, { encoding: 'utf-8' });
  const lines = readline.createInterface({ input, crlfDelay: Infinity });
  try {
    for await (const line of lines) {
      reader.feed(line);
    }
  } finally {
    lines.close();
    input.destroy();
  }
  return reader.finish();
}

/**
 * 변형 이름 → 그룹 매핑. 이름이 중복되면 상관 오류
 */
export function indexByVariant(groups: VariantDigestGroup[]): Map<string, VariantDigestGroup> {
  const index = new Map<string, VariantDigestGroup>();
  for (const group of groups) {
    if (index.has(group.variantName)) {
      throw new VariantCorrelationError(
        group.variantName,
        `전송 파일에 변형 이름이 중복됩니다: ${group.variantName}`
      );
    }
    index.set(group.variantName, group);
  }
  return index;
}
