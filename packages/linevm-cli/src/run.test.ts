/**
 * Program file runner tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { BufferedOutput, Cell } from 'linevm-core';
import { runProgramFile } from './run.js';

describe('runProgramFile', () => {
  let dir: string;
  let output: BufferedOutput;

  function writeProgram(name: string, text: string): void {
    fs.writeFileSync(path.join(dir, name), text);
  }

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'linevm-'));
    output = new BufferedOutput();
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should run code.txt when no file is given', () => {
    writeProgram('code.txt', 'push 5\npush 3\nadd\nprt\n');

    const status = runProgramFile(undefined, { cwd: dir, env: {} }, output);

    expect(status).toBe(0);
    expect(output.printed).toEqual([Cell.fromInt(8).toString()]);
    expect(output.warnings).toEqual([]);
  });

  it('should fail on a missing file', () => {
    const status = runProgramFile('missing.txt', { cwd: dir, env: {} }, output);

    expect(status).toBe(1);
    expect(output.warnings).toEqual(['Error: Program file not found: missing.txt']);
  });

  it('should report machine errors and exit with status 1', () => {
    writeProgram('dup.txt', ':a\n:a\n');

    const status = runProgramFile('dup.txt', { cwd: dir, env: {} }, output);

    expect(status).toBe(1);
    expect(output.warnings).toEqual([
      'Error: Line 1: Label with name a has been reused (first declared at line 0), invalid program',
    ]);
  });

  it('should add the stack trace when DEBUG is set', () => {
    writeProgram('bad.txt', 'bogus');

    const status = runProgramFile('bad.txt', { cwd: dir, env: { DEBUG: '1' } }, output);

    expect(status).toBe(1);
    expect(output.warnings).toHaveLength(2);
    expect(output.warnings[0]).toBe("Error: Line 0: Unknown instruction 'bogus'");
    expect(output.warnings[1]).toContain("Line 0: Unknown instruction 'bogus'");
  });

  it('should report reaching the step limit as an error', () => {
    writeProgram('loop.txt', 'push 1\n:top\njmp top');

    const status = runProgramFile('loop.txt', { cwd: dir, env: {}, maxSteps: 5 }, output);

    expect(status).toBe(1);
    expect(output.warnings).toEqual(['Error: Step limit reached after 5 instructions (line 1)']);
  });

  it('should print the listing before running', () => {
    writeProgram('list.txt', 'push 1\n:end\nmov 3');

    const status = runProgramFile('list.txt', { cwd: dir, env: {}, listing: true }, output);

    expect(status).toBe(0);
    expect(output.printed).toEqual(['0: push 1', '1: ', '2: mov_r2s 3']);
  });

  it('should trace when DEBUG_VM is set', () => {
    writeProgram('one.txt', 'push 1');

    const status = runProgramFile('one.txt', { cwd: dir, env: { DEBUG_VM: '1' } }, output);

    expect(status).toBe(0);
    expect(output.warnings).toEqual(['[Machine] 0: push 1']);
  });
});
