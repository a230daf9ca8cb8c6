import { BootstrapErrorCode } from '../../../src/shared/errors.js';
import { probeToolchain, requiredToolchains } from '../../../src/toolchain/probe.js';
import type { ToolchainSpec } from '../../../src/types/config.js';
import { FakeRunner } from '../../helpers/fake-runner.js';
import { addExecutable, createSandbox, removeSandbox, testConfig, testEnv, type Sandbox } from '../../helpers/sandbox.js';

const xcode: ToolchainSpec = {
  name: 'xcode-clt',
  description: 'Xcode Command Line Tools',
  platforms: ['darwin'],
  probe: { command: 'xcode-select', args: ['-p'] },
  install: { method: 'system-dialog', command: ['xcode-select', '--install'] },
};

describe('probeToolchain', () => {
  let sandbox: Sandbox;
  let rust: ToolchainSpec;

  beforeEach(async () => {
    sandbox = await createSandbox();
    const [spec] = testConfig(sandbox).toolchains;
    if (!spec) throw new Error('test config has no toolchain');
    rust = spec;
  });

  afterEach(async () => {
    await removeSandbox(sandbox);
  });

  it('reports absent without running anything when the command is not on PATH', async () => {
    const runner = new FakeRunner();
    const state = await probeToolchain(rust, testEnv(sandbox, [sandbox.tools]), runner);
    expect(state).toEqual({ name: 'rust', present: false });
    expect(runner.calls).toHaveLength(0);
  });

  it('reports present with the first line of the version command', async () => {
    await addExecutable(sandbox.tools, 'cargo');
    const runner = new FakeRunner().on(['rustc', '--version'], { stdout: 'rustc 1.82.0 (f6e511eec 2024-10-15)\nextra\n' });
    const state = await probeToolchain(rust, testEnv(sandbox, [sandbox.tools]), runner);
    expect(state).toEqual({ name: 'rust', present: true, version: 'rustc 1.82.0 (f6e511eec 2024-10-15)' });
  });

  it('omits the version when the version command fails', async () => {
    await addExecutable(sandbox.tools, 'cargo');
    const runner = new FakeRunner().on(['rustc'], { exitCode: 127 });
    const state = await probeToolchain(rust, testEnv(sandbox, [sandbox.tools]), runner);
    expect(state).toEqual({ name: 'rust', present: true });
  });

  it('treats a failing probe command as absent', async () => {
    await addExecutable(sandbox.tools, 'xcode-select');
    const runner = new FakeRunner().on(['xcode-select', '-p'], { exitCode: 2 });
    const state = await probeToolchain(xcode, testEnv(sandbox, [sandbox.tools]), runner);
    expect(state).toEqual({ name: 'xcode-clt', present: false });
    expect(runner.argvs()).toEqual([['xcode-select', '-p']]);
  });

  it('runs the resolved probe command with the probed environment', async () => {
    const resolved = await addExecutable(sandbox.tools, 'xcode-select');
    const runner = new FakeRunner();
    const env = testEnv(sandbox, [sandbox.tools]);
    await probeToolchain(xcode, env, runner);
    expect(runner.calls[0]).toMatchObject({ argv: [resolved, '-p'], env: env.vars });
  });

  it('throws ENVIRONMENT when PATH is missing', async () => {
    const env = { ...testEnv(sandbox, []), vars: {} };
    await expect(probeToolchain(rust, env, new FakeRunner())).rejects.toMatchObject({
      code: BootstrapErrorCode.ENVIRONMENT,
    });
  });
});

describe('requiredToolchains', () => {
  it('keeps toolchains for the platform and those without a platform list', async () => {
    const sandbox = await createSandbox();
    try {
      const [rust] = testConfig(sandbox).toolchains;
      if (!rust) throw new Error('test config has no toolchain');
      expect(requiredToolchains([xcode, rust], 'darwin').map((t) => t.name)).toEqual(['xcode-clt', 'rust']);
      expect(requiredToolchains([xcode, rust], 'linux').map((t) => t.name)).toEqual(['rust']);
    } finally {
      await removeSandbox(sandbox);
    }
  });
});
