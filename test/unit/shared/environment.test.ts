import fs from 'fs/promises';
import path from 'path';
import {
  resolveExecutable,
  searchPath,
  withPathPrepended,
  type ProcessEnvironment,
} from '../../../src/shared/environment.js';
import { BootstrapErrorCode } from '../../../src/shared/errors.js';
import { addExecutable, createSandbox, removeSandbox, testEnv, type Sandbox } from '../../helpers/sandbox.js';

describe('searchPath', () => {
  let sandbox: Sandbox;

  beforeEach(async () => {
    sandbox = await createSandbox();
  });

  afterEach(async () => {
    await removeSandbox(sandbox);
  });

  it('splits PATH and drops empty entries', () => {
    const env = testEnv(sandbox, ['/a', '', '/b']);
    expect(searchPath(env)).toEqual(['/a', '/b']);
  });

  it('throws ENVIRONMENT when PATH is not set', () => {
    const env: ProcessEnvironment = { ...testEnv(sandbox, []), vars: { HOME: sandbox.home } };
    let caught: unknown;
    try {
      searchPath(env);
    } catch (err) {
      caught = err;
    }
    expect(caught).toMatchObject({ code: BootstrapErrorCode.ENVIRONMENT, message: 'PATH is not set; cannot resolve commands' });
  });
});

describe('withPathPrepended', () => {
  let sandbox: Sandbox;

  beforeEach(async () => {
    sandbox = await createSandbox();
  });

  afterEach(async () => {
    await removeSandbox(sandbox);
  });

  it('returns a new environment and leaves the original untouched', () => {
    const env = testEnv(sandbox, ['/usr/bin', '/bin']);
    const next = withPathPrepended(env, ['/opt/cargo/bin']);
    expect(next.vars.PATH).toBe(['/opt/cargo/bin', '/usr/bin', '/bin'].join(path.delimiter));
    expect(env.vars.PATH).toBe(['/usr/bin', '/bin'].join(path.delimiter));
  });

  it('moves an existing entry to the front instead of duplicating it', () => {
    const env = testEnv(sandbox, ['/usr/bin', '/opt/cargo/bin']);
    const next = withPathPrepended(env, ['/opt/cargo/bin']);
    expect(next.vars.PATH).toBe(['/opt/cargo/bin', '/usr/bin'].join(path.delimiter));
  });
});

describe('resolveExecutable', () => {
  let sandbox: Sandbox;

  beforeEach(async () => {
    sandbox = await createSandbox();
  });

  afterEach(async () => {
    await removeSandbox(sandbox);
  });

  it('returns the first executable match in PATH order', async () => {
    const first = path.join(sandbox.root, 'first');
    const second = path.join(sandbox.root, 'second');
    await addExecutable(second, 'cargo');
    const expected = await addExecutable(first, 'cargo');
    const env = testEnv(sandbox, [first, second]);
    await expect(resolveExecutable('cargo', env)).resolves.toBe(expected);
  });

  it('skips files without execute permission', async () => {
    await fs.writeFile(path.join(sandbox.tools, 'cargo'), 'not a program', { mode: 0o644 });
    const env = testEnv(sandbox, [sandbox.tools]);
    await expect(resolveExecutable('cargo', env)).resolves.toBeNull();
  });

  it('skips directories with the same name', async () => {
    await fs.mkdir(path.join(sandbox.tools, 'cargo'));
    const env = testEnv(sandbox, [sandbox.tools]);
    await expect(resolveExecutable('cargo', env)).resolves.toBeNull();
  });

  it('returns null when nothing matches', async () => {
    const env = testEnv(sandbox, [sandbox.tools]);
    await expect(resolveExecutable('cargo', env)).resolves.toBeNull();
  });
});
