import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { Mock, MockInstance } from 'vitest';

interface SpinnerStub {
  text: string;
  start: Mock<() => SpinnerStub>;
  succeed: Mock;
  fail: Mock;
  info: Mock;
}

const spinner = vi.hoisted(() => {
  const instance: SpinnerStub = {
    text: '',
    start: vi.fn(() => instance),
    succeed: vi.fn(),
    fail: vi.fn(),
    info: vi.fn()
  };
  return instance;
});

vi.mock('ora', () => ({ default: vi.fn(() => spinner) }));

import { PartLabelCli } from '../src/cli.js';
import { AppConfig } from '../src/env.js';
import { SpreadsheetLoadError } from '../src/spreadsheetLoader.js';

describe('PartLabelCli', () => {
  let tempDir: string;
  let config: AppConfig;
  let logSpy: MockInstance<typeof console.log>;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'part-labels-cli-'));
    config = { port: 0, outputDir: tempDir, defaultVariant: 'v1', uploadLimit: '1mb', webPassword: '' };
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    spinner.succeed.mockClear();
    spinner.fail.mockClear();
  });

  afterEach(async () => {
    logSpy.mockRestore();
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('fails the spinner before reporting an unreadable file', async () => {
    const cli = new PartLabelCli(config);
    const missing = path.join(tempDir, 'missing.xlsx');

    await expect(cli.run({ filePath: missing, variant: 'v1', help: false })).rejects.toBeInstanceOf(SpreadsheetLoadError);
    expect(spinner.fail).toHaveBeenCalledTimes(1);
    expect(spinner.fail).toHaveBeenCalledWith(expect.stringContaining('Could not load missing.xlsx'));
    expect(spinner.succeed).not.toHaveBeenCalled();
  });

  it('writes the PDF for a file given on the command line', async () => {
    const sourcePath = path.join(tempDir, 'parts.csv');
    await fs.writeFile(sourcePath, 'Part No,Desc,Loc\nP1,Bolt,A_1\n', 'utf8');
    const cli = new PartLabelCli(config, path.join(tempDir, 'out'));

    await expect(cli.run({ filePath: sourcePath, variant: 'v2', help: false })).resolves.toBe(true);
    expect(spinner.fail).not.toHaveBeenCalled();
    const written = await fs.readFile(path.join(tempDir, 'out', 'singlepart_labels.pdf'));
    expect(written.subarray(0, 5).toString('latin1')).toBe('%PDF-');
  });
});
