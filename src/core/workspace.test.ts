import { describe, it, expect } from 'vitest';
import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import { Workspace, withWorkspace } from './workspace';

describe('Workspace', () => {
  it('시스템 임시 디렉토리 아래에 생성', async () => {
    const workspace = await Workspace.create('workspace-test-');
    try {
      expect(path.dirname(workspace.root)).toBe(path.resolve(os.tmpdir()));
      expect(path.basename(workspace.root).startsWith('workspace-test-')).toBe(true);
      expect(workspace.path('a', 'b.apk')).toBe(path.join(workspace.root, 'a', 'b.apk'));

      const dir = await workspace.dir('apks', 'split');
      expect((await fs.stat(dir)).isDirectory()).toBe(true);
    } finally {
      await workspace.dispose();
    }
    expect(workspace.isDisposed).toBe(true);
    expect(await fs.pathExists(workspace.root)).toBe(false);
  });

  it('호출마다 다른 디렉토리', async () => {
    const [a, b] = await Promise.all([Workspace.create(), Workspace.create()]);
    expect(a.root).not.toBe(b.root);
    await a.dispose();
    await b.dispose();
  });

  it('dispose는 여러 번 불러도 됨', async () => {
    const workspace = await Workspace.create();
    await workspace.dispose();
    await workspace.dispose();
    expect(workspace.isDisposed).toBe(true);
  });

  describe('withWorkspace', () => {
    it('정상 종료 후 삭제하고 결과 반환', async () => {
      let root = '';
      const result = await withWorkspace(async (workspace) => {
        root = workspace.root;
        await fs.writeFile(path.join(await workspace.dir('scratch'), 'x.apk'), 'x');
        return 42;
      });
      expect(result).toBe(42);
      expect(await fs.pathExists(root)).toBe(false);
    });

    it('실패해도 삭제하고 원래 에러를 던짐', async () => {
      let root = '';
      await expect(
        withWorkspace(async (workspace) => {
          root = workspace.root;
          throw new Error('boom');
        })
      ).rejects.toThrow('boom');
      expect(await fs.pathExists(root)).toBe(false);
    });

    it('시그널 핸들러를 남기지 않음', async () => {
      const before = process.listenerCount('SIGINT');
      await withWorkspace(async () => {
        expect(process.listenerCount('SIGINT')).toBe(before + 1);
      });
      expect(process.listenerCount('SIGINT')).toBe(before);
    });
  });
});
