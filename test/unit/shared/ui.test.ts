import chalk from 'chalk';
import { Writable } from 'stream';
import { createConsoleReporter } from '../../../src/shared/ui.js';

// Writable collects synchronously, so assertions can follow the calls directly.
function capture(): { stream: Writable; text: () => string } {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      chunks.push(chunk.toString());
      callback();
    },
  });
  return { stream, text: () => chunks.join('') };
}

describe('createConsoleReporter', () => {
  const plain = new chalk.Instance({ level: 0 });

  it('writes info and success lines to stdout', () => {
    const out = capture();
    const err = capture();
    const reporter = createConsoleReporter({ out: out.stream, err: err.stream }, plain);
    reporter.info('Checking for Rust toolchain...');
    reporter.success('Rust toolchain found');
    expect(out.text()).toBe('==> Checking for Rust toolchain...\n==> Rust toolchain found\n');
    expect(err.text()).toBe('');
  });

  it('writes warnings, failures and hints to stderr', () => {
    const out = capture();
    const err = capture();
    const reporter = createConsoleReporter({ out: out.stream, err: err.stream }, plain);
    reporter.warn('/home/u/.cargo/bin is not on your PATH');
    reporter.fail('Cannot write to /usr/local/bin: elevation was denied');
    reporter.hint("Run 'install-user' instead.");
    expect(err.text()).toBe(
      '==> /home/u/.cargo/bin is not on your PATH\n' +
        '==> Cannot write to /usr/local/bin: elevation was denied\n' +
        "    Run 'install-user' instead.\n",
    );
    expect(out.text()).toBe('');
  });

  it('indents detail lines and leaves empty ones empty', () => {
    const out = capture();
    const err = capture();
    const reporter = createConsoleReporter({ out: out.stream, err: err.stream }, plain);
    reporter.detail('A system dialog should have appeared.');
    reporter.detail('');
    expect(out.text()).toBe('    A system dialog should have appeared.\n\n');
  });

  it('colors the status marker when colors are enabled', () => {
    const out = capture();
    const err = capture();
    const colored = new chalk.Instance({ level: 1 });
    const reporter = createConsoleReporter({ out: out.stream, err: err.stream }, colored);
    reporter.success('Installed');
    expect(out.text()).toBe(`${colored.bold.green('==> Installed')}\n`);
    expect(out.text()).not.toBe('==> Installed\n');
  });
});
