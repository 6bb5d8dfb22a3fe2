import { promises as fs } from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import { v4 as uuidv4 } from 'uuid';
import { isWithinRoot, realpathResolver } from '../../src/path-guard.js';
import { CommandValidator } from '../../src/validator.js';
import { RejectionReason } from '../../src/types.js';
import { errnoCode, errorMessage } from '../../src/errors.js';

describe('isWithinRoot', () => {
  it.each([
    ['/srv/docs', '/srv/docs', true],
    ['/srv/docs', '/srv/docs/guide/intro.md', true],
    ['/srv/docs', '/srv/docs/..notes', true],
    ['/srv/docs', '/srv', false],
    ['/srv/docs', '/srv/docs-private', false],
    ['/srv/docs', '/etc/passwd', false],
  ])('%s contains %s: %s', (root, target, expected) => {
    expect(isWithinRoot(root, target)).toBe(expected);
  });
});

describe('symlink resolution', () => {
  let baseDir: string;
  let docsDir: string;

  beforeEach(async () => {
    baseDir = path.join(os.tmpdir(), `docscout-links-${uuidv4()}`);
    docsDir = path.join(baseDir, 'docs');
    await fs.mkdir(path.join(docsDir, 'guide'), { recursive: true });
    await fs.mkdir(path.join(baseDir, 'outside'), { recursive: true });
    await fs.writeFile(path.join(baseDir, 'outside', 'secret.txt'), 'secret\n');
    await fs.writeFile(path.join(docsDir, 'guide', 'intro.md'), '# Intro\n');
    await fs.symlink(path.join(baseDir, 'outside'), path.join(docsDir, 'link'));
    await fs.symlink(path.join(docsDir, 'guide'), path.join(docsDir, 'inner'));
  });

  afterEach(async () => {
    await fs.rm(baseDir, { recursive: true, force: true });
  });

  it('rejects a symlink pointing outside the root', () => {
    const validator = new CommandValidator(docsDir, { resolveLinks: realpathResolver() });
    expect(validator.validate('cat link/secret.txt')).toEqual({
      allowed: false,
      reason: RejectionReason.PATH_ESCAPE,
      detail: 'link/secret.txt links outside the document root',
      tokens: ['cat', 'link/secret.txt'],
    });
  });

  it('rejects a missing file beneath an escaping symlink', () => {
    const validator = new CommandValidator(docsDir, { resolveLinks: realpathResolver() });
    const decision = validator.validate('cat link/missing.txt');
    expect(decision.allowed).toBe(false);
  });

  it('accepts a symlink that stays inside the root', () => {
    const validator = new CommandValidator(docsDir, { resolveLinks: realpathResolver() });
    expect(validator.validate('cat inner/intro.md').allowed).toBe(true);
  });

  it('accepts search patterns that name no existing file', () => {
    const validator = new CommandValidator(docsDir, { resolveLinks: realpathResolver() });
    expect(validator.validate("grep -E 'a.*b' guide/intro.md")).toEqual({
      allowed: true,
      tokens: ['grep', '-E', 'a.*b', 'guide/intro.md'],
    });
    expect(validator.validate("awk '{ print $1 }' guide/intro.md").allowed).toBe(true);
  });

  it('only checks paths lexically without a resolver', () => {
    const validator = new CommandValidator(docsDir);
    expect(validator.validate('cat link/secret.txt').allowed).toBe(true);
  });

  it('resolves missing leaves through their nearest existing ancestor', async () => {
    const resolve = realpathResolver();
    const realOutside = await fs.realpath(path.join(baseDir, 'outside'));
    expect(resolve(path.join(docsDir, 'link', 'new', 'file.md'))).toBe(path.join(realOutside, 'new', 'file.md'));
  });
});

describe('errno helpers', () => {
  it('read the code from a filesystem error', async () => {
    const error = await fs.readFile(path.join(os.tmpdir(), `docscout-missing-${uuidv4()}`)).catch((err: unknown) => err);
    expect(errnoCode(error)).toBe('ENOENT');
    expect(errorMessage(error)).toMatch(/^ENOENT: no such file or directory/);
  });

  it('read plain error-shaped objects', () => {
    expect(errnoCode({ code: 'ENOTDIR', message: 'not a directory' })).toBe('ENOTDIR');
    expect(errorMessage({ code: 'ENOTDIR', message: 'not a directory' })).toBe('not a directory');
    expect(errnoCode('ENOENT')).toBeUndefined();
    expect(errorMessage('plain')).toBe('plain');
  });
});
