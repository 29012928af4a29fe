/**
 * Label resolution tests
 */

import { describe, it, expect } from 'vitest';
import { resolveLabels } from './labels.js';
import { ProgramValidityError } from '../errors.js';

describe('resolveLabels', () => {
  it('should leave a label-free program unchanged', () => {
    const source = ['push 1', '# comment', '', 'add'];
    const { lines, labels } = resolveLabels(source);

    expect(lines).toEqual(source);
    expect(labels.size).toBe(0);
  });

  it('should resolve forward and backward references', () => {
    const { lines, labels } = resolveLabels([':start', 'push 1', 'jmp end', 'jmp start', ':end']);

    expect(labels.get('start')).toBe(0);
    expect(labels.get('end')).toBe(4);
    expect(lines).toEqual(['', 'push 1', 'jmp 4', 'jmp 0', '']);
  });

  it('should substitute longer names first', () => {
    const { lines } = resolveLabels([':loop', 'jmp loop2', 'jmp loop', ':loop2']);

    expect(lines).toEqual(['', 'jmp 3', 'jmp 0', '']);
  });

  it('should substitute every occurrence on a line', () => {
    const { lines } = resolveLabels(['je here,here', ':here']);

    expect(lines).toEqual(['je 1,1', '']);
  });

  it('should not modify the source lines', () => {
    const source = [':a', 'jmp a'];
    resolveLabels(source);

    expect(source).toEqual([':a', 'jmp a']);
  });

  it('should reject a reused label name', () => {
    const run = () => resolveLabels([':a', 'push 1', ':a']);

    expect(run).toThrow(ProgramValidityError);
    expect(run).toThrow('Line 2: Label with name a has been reused (first declared at line 0), invalid program');
  });

  it('should reject a label without a name', () => {
    expect(() => resolveLabels(['push 1', ':'])).toThrow('Line 1: Label declaration without a name');
  });
});
