import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import { WorkspaceCleanupError, errorMessage } from './errors';
import logger from '../utils/logger';

const INTERRUPT_SIGNALS: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

/**
 * 실행 단위 임시 작업 디렉토리
 *
 * 추출된 APK, 중간 산출물, 일회용 키스토어가 모두 이 아래에 생성되며
 * dispose() 시 통째로 삭제됩니다. 호출마다 새 디렉토리를 만들기 때문에
 * 동시에 여러 번 실행해도 중간 파일이 섞이지 않습니다.
 */
export class Workspace {
  private disposed = false;

  private constructor(readonly root: string) {}

  /**
   * 시스템 임시 디렉토리 아래에 새 작업 디렉토리 생성
   */
  static async create(prefix = 'bundle-signer-'): Promise<Workspace> {
    const root = await fs.mkdtemp(path.join(os.tmpdir(), prefix));
    logger.debug('작업 디렉토리 생성', { root });
    return new Workspace(root);
  }

  /**
   * 작업 디렉토리 내부 경로
   */
  path(...segments: string[]): string {
    return path.join(this.root, ...segments);
  }

  /**
   * 하위 디렉토리를 만들고 경로 반환
   */
  async dir(...segments: string[]): Promise<string> {
    const dirPath = this.path(...segments);
    await fs.ensureDir(dirPath);
    return dirPath;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  /**
   * 작업 디렉토리 삭제
   */
  async dispose(): Promise<void> {
    if (this.disposed) return;
    try {
      await fs.remove(this.root);
    } catch (error) {
      throw new WorkspaceCleanupError(`임시 디렉토리 삭제 실패: ${this.root}`, { cause: error });
    }
    this.disposed = true;
    logger.debug('작업 디렉토리 삭제', { root: this.root });
  }

  /**
   * 시그널 핸들러용 동기 삭제
   */
  disposeSync(): void {
    if (this.disposed) return;
    try {
      fs.removeSync(this.root);
    } catch (error) {
      throw new WorkspaceCleanupError(`임시 디렉토리 삭제 실패: ${this.root}`, { cause: error });
    }
    this.disposed = true;
  }
}

/**
 * 작업 디렉토리를 만들어 fn에 넘기고, 정상 종료/에러/인터럽트 모두에서 삭제합니다.
 *
 * fn이 실패하면 그 에러를 그대로 던지며, 이때 정리 실패는 로그로만 남깁니다.
 */
export async function withWorkspace<T>(
  fn: (workspace: Workspace) => Promise<T>,
  prefix?: string
): Promise<T> {
  const workspace = await Workspace.create(prefix);

  const onSignal = (signal: NodeJS.Signals) => {
    let exitCode = signal === 'SIGINT' ? 130 : 143;
    try {
      workspace.disposeSync();
    } catch (error) {
      logger.error(errorMessage(error));
      exitCode = new WorkspaceCleanupError(errorMessage(error)).exitCode;
    }
    process.exit(exitCode);
  };
  for (const signal of INTERRUPT_SIGNALS) {
    process.once(signal, onSignal);
  }

  let result: T;
  try {
    result = await fn(workspace);
  } catch (error) {
    try {
      await workspace.dispose();
    } catch (cleanupError) {
      logger.warn(errorMessage(cleanupError));
    }
    throw error;
  } finally {
    for (const signal of INTERRUPT_SIGNALS) {
      process.removeListener(signal, onSignal);
    }
  }

  await workspace.dispose();
  return result;
}
