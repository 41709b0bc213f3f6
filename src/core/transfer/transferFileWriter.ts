import * as fs from 'fs-extra';
import * as path from 'path';
import { SchemeFlags, TransferFile, TransferHeader, VariantDigestGroup } from '../../types';
import { VariantCorrelationError } from '../errors';
import { formatFlagsLine, formatGroup, formatVersionLine } from './transferFormat';

/**
 * 전송 파일 전체를 문자열로 변환
 */
export function formatTransferFile(file: TransferFile): string {
  const lines = [formatVersionLine(file.header), formatFlagsLine(file.flags)];
  const seen = new Set<string>();
  for (const group of file.groups) {
    if (seen.has(group.variantName)) {
      throw duplicateVariant(group.variantName);
    }
    seen.add(group.variantName);
    lines.push(...formatGroup(group, file.flags));
  }
  return lines.map((line) => `${line}\n`).join('');
}

/**
 * 전송 파일 기록기
 *
 * create()로 헤더를 쓰고, APK Set 순회마다 append()로 그룹을 이어 붙입니다.
 * 한 기록기 안에서 변형 이름은 중복될 수 없습니다.
 */
export class TransferFileWriter {
  private readonly seen = new Set<string>();
  private created = false;
  private groupCount = 0;

  constructor(
    readonly filePath: string,
    readonly header: TransferHeader,
    readonly flags: SchemeFlags
  ) {}

  /**
   * 대상 파일을 새로 만들고 헤더 두 줄을 기록
   */
  async create(): Promise<void> {
    await fs.ensureDir(path.dirname(this.filePath));
    await fs.writeFile(
      this.filePath,
      `${formatVersionLine(this.header)}\n${formatFlagsLine(this.flags)}\n`,
      'utf-8'
    );
    this.seen.clear();
    this.groupCount = 0;
    this.created = true;
  }

  /**
   * 그룹들을 순서대로 파일 끝에 추가
   */
  async append(groups: VariantDigestGroup[]): Promise<void> {
    if (!this.created) {
      throw new Error('create()를 먼저 호출해야 합니다');
    }
    if (groups.length === 0) return;

    const lines: string[] = [];
    const batch = new Set<string>();
    for (const group of groups) {
      if (this.seen.has(group.variantName) || batch.has(group.variantName)) {
        throw duplicateVariant(group.variantName);
      }
      batch.add(group.variantName);
      lines.push(...formatGroup(group, this.flags));
    }

    await fs.appendFile(this.filePath, lines.map((line) => `${line}\n`).join(''), 'utf-8');
    for (const name of batch) {
      this.seen.add(name);
    }
    this.groupCount += groups.length;
  }

  /** 지금까지 기록한 그룹 수 */
  get count(): number {
    return this.groupCount;
  }
}

function duplicateVariant(variantName: string): VariantCorrelationError {
  return new VariantCorrelationError(
    variantName,
    `변형 이름이 중복됩니다: ${variantName} (split/universal APK Set 전체에서 고유해야 합니다)`
  );
}
