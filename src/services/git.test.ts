import { beforeEach, describe, expect, it, vi } from 'vitest';
import { ErrorType } from '../types/error-handler.js';
import { GitService, formatFileSize } from './git.js';

const gitMock = vi.hoisted(() => ({
  checkIsRepo: vi.fn(),
  diff: vi.fn(),
  raw: vi.fn(),
  add: vi.fn(),
  commit: vi.fn(),
}));

vi.mock('simple-git', () => ({ default: () => gitMock }));

const stubIndex = (): void => {
  gitMock.raw.mockImplementation(async (args: string[]) =>
    args[0] === 'ls-files' ? `100644 abc123 0\t${args[2]}\n` : '2048\n'
  );
};

describe('GitService', () => {
  let git: GitService;

  beforeEach(() => {
    git = new GitService('/repo');
  });

  describe('isGitRepository', () => {
    it('reports a repository', async () => {
      gitMock.checkIsRepo.mockResolvedValue(true);
      await expect(git.isGitRepository()).resolves.toBe(true);
    });

    it('treats git failures as no repository', async () => {
      gitMock.checkIsRepo.mockRejectedValue(new Error('fatal: not a git repository'));
      await expect(git.isGitRepository()).resolves.toBe(false);
    });
  });

  describe('getChangedFiles', () => {
    it('lists staged files with index details and drops ignored ones', async () => {
      gitMock.diff.mockImplementation(async (args: string[]) =>
        args.includes('--name-only')
          ? 'src/app.ts\npackage-lock.json\nassets/logo.png\n'
          : '1\t0\tsrc/app.ts\n-\t-\tassets/logo.png\n'
      );
      stubIndex();

      await expect(git.getChangedFiles()).resolves.toEqual([
        { path: 'src/app.ts', hash: 'abc123', size: 2048 },
        { path: 'assets/logo.png', isBinary: true, hash: 'abc123', size: 2048 },
      ]);
    });

    it('leaves hash and size out when the index lookup fails', async () => {
      gitMock.diff.mockImplementation(async (args: string[]) =>
        args.includes('--name-only') ? 'src/removed.ts\n' : ''
      );
      gitMock.raw.mockRejectedValue(new Error('fatal: bad object'));

      await expect(git.getChangedFiles()).resolves.toEqual([{ path: 'src/removed.ts' }]);
    });

    it('returns nothing when only ignored files are staged', async () => {
      gitMock.diff.mockResolvedValue('yarn.lock\n');

      await expect(git.getChangedFiles()).resolves.toEqual([]);
      expect(gitMock.raw).not.toHaveBeenCalled();
    });
  });

  describe('getDiff', () => {
    it('returns the staged text diff for the given files', async () => {
      gitMock.diff.mockImplementation(async (args: string[]) =>
        args.includes('--numstat') ? '3\t1\tsrc/app.ts\n' : 'diff --git a/src/app.ts b/src/app.ts\n'
      );

      await expect(git.getDiff([{ path: 'src/app.ts' }])).resolves.toBe(
        'diff --git a/src/app.ts b/src/app.ts\n'
      );
      expect(gitMock.diff).toHaveBeenLastCalledWith(['--staged', '--', 'src/app.ts']);
    });

    it('summarises binary changes instead of diffing them', async () => {
      gitMock.diff.mockResolvedValue('-\t-\tassets/logo.png\n');

      await expect(
        git.getDiff([{ path: 'assets/logo.png', isBinary: true, size: 2048 }, { path: 'data.bin' }])
      ).resolves.toBe('Binary files changed:\n- assets/logo.png (2.00 KB)\n- data.bin (size unknown)\n');
    });
  });

  describe('stageFiles', () => {
    it('resets the index and adds each path', async () => {
      gitMock.raw.mockResolvedValue('');
      gitMock.add.mockResolvedValue('');

      await git.stageFiles(['src/a.ts', 'src/b.ts']);

      expect(gitMock.raw).toHaveBeenCalledWith(['reset']);
      expect(gitMock.add.mock.calls).toEqual([['src/a.ts'], ['src/b.ts']]);
    });

    it('rejects an empty list', async () => {
      await expect(git.stageFiles([])).rejects.toMatchObject({ type: ErrorType.VALIDATION_ERROR });
      expect(gitMock.raw).not.toHaveBeenCalled();
    });
  });

  describe('createCommit', () => {
    it('commits title and body as separate paragraphs', async () => {
      gitMock.commit.mockResolvedValue({ commit: 'abc123' });

      await expect(git.createCommit(' feat: add search ', 'Adds search.')).resolves.toBe(true);
      expect(gitMock.commit).toHaveBeenCalledWith(['feat: add search', 'Adds search.']);
    });

    it('omits a blank body', async () => {
      gitMock.commit.mockResolvedValue({ commit: 'abc123' });

      await git.createCommit('chore: bump', '  ');

      expect(gitMock.commit).toHaveBeenCalledWith(['chore: bump']);
    });

    it('reports when git created no commit', async () => {
      gitMock.commit.mockResolvedValue({ commit: '' });

      await expect(git.createCommit('chore: bump', '')).resolves.toBe(false);
    });

    it('rejects unsafe titles before calling git', async () => {
      await expect(git.createCommit('<script>alert(1)</script>', '')).rejects.toMatchObject({
        type: ErrorType.VALIDATION_ERROR,
      });
      expect(gitMock.commit).not.toHaveBeenCalled();
    });
  });
});

describe('formatFileSize', () => {
  it.each([
    [512, '512.00 B'],
    [1536, '1.50 KB'],
    [5 * 1024 * 1024, '5.00 MB'],
  ])('formats %i bytes as %s', (bytes, expected) => {
    expect(formatFileSize(bytes)).toBe(expected);
  });
});
