import { BootstrapErrorCode } from '../../../src/shared/errors.js';
import { CurlChannel, PINNED_CURL_FLAGS } from '../../../src/toolchain/channel.js';
import { FakeRunner } from '../../helpers/fake-runner.js';
import { addExecutable, createSandbox, removeSandbox, testEnv, type Sandbox } from '../../helpers/sandbox.js';

describe('CurlChannel', () => {
  let sandbox: Sandbox;

  beforeEach(async () => {
    sandbox = await createSandbox();
  });

  afterEach(async () => {
    await removeSandbox(sandbox);
  });

  it('downloads with pinned TLS flags and pipes the script to sh', async () => {
    await addExecutable(sandbox.tools, 'curl');
    const runner = new FakeRunner().on(['curl'], { stdout: '#!/bin/sh\necho rustup\n' });
    const env = testEnv(sandbox, [sandbox.tools]);

    await new CurlChannel(runner).fetchAndRun('https://sh.rustup.rs', ['-y'], env);

    expect(runner.argvs()).toEqual([
      ['curl', '--proto', '=https', '--tlsv1.2', '--silent', '--show-error', '--fail', 'https://sh.rustup.rs'],
      ['sh', '-s', '--', '-y'],
    ]);
    expect(runner.calls[1]).toMatchObject({ input: '#!/bin/sh\necho rustup\n', stream: true, env: env.vars });
    expect(PINNED_CURL_FLAGS).toContain('--tlsv1.2');
  });

  it('refuses non-https URLs before running anything', async () => {
    await addExecutable(sandbox.tools, 'curl');
    const runner = new FakeRunner();
    await expect(
      new CurlChannel(runner).fetchAndRun('http://sh.rustup.rs', ['-y'], testEnv(sandbox, [sandbox.tools])),
    ).rejects.toMatchObject({ code: BootstrapErrorCode.TOOLCHAIN_INSTALL });
    expect(runner.calls).toHaveLength(0);
  });

  it('fails when curl is not installed', async () => {
    const runner = new FakeRunner();
    await expect(
      new CurlChannel(runner).fetchAndRun('https://sh.rustup.rs', ['-y'], testEnv(sandbox, [sandbox.tools])),
    ).rejects.toMatchObject({
      code: BootstrapErrorCode.TOOLCHAIN_INSTALL,
      message: 'curl is required to download the toolchain installer',
    });
  });

  it('does not run anything when the download fails', async () => {
    await addExecutable(sandbox.tools, 'curl');
    const runner = new FakeRunner().on(['curl'], { exitCode: 6, stderr: 'curl: (6) Could not resolve host\n' });
    await expect(
      new CurlChannel(runner).fetchAndRun('https://sh.rustup.rs', ['-y'], testEnv(sandbox, [sandbox.tools])),
    ).rejects.toMatchObject({
      code: BootstrapErrorCode.TOOLCHAIN_INSTALL,
      message: 'Failed to download installer from https://sh.rustup.rs',
      context: { exitCode: 6, stderr: 'curl: (6) Could not resolve host' },
    });
    expect(runner.argvs().map((argv) => argv[0])).toEqual(['curl']);
  });

  it('fails when the installer script exits non-zero', async () => {
    await addExecutable(sandbox.tools, 'curl');
    const runner = new FakeRunner().on(['curl'], { stdout: 'exit 1\n' }).on(['sh'], { exitCode: 1 });
    await expect(
      new CurlChannel(runner).fetchAndRun('https://sh.rustup.rs', ['-y'], testEnv(sandbox, [sandbox.tools])),
    ).rejects.toMatchObject({
      code: BootstrapErrorCode.TOOLCHAIN_INSTALL,
      message: 'Installer from https://sh.rustup.rs exited with code 1',
    });
  });
});
