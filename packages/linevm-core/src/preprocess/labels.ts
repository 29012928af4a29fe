/**
 * Label resolution
 *
 * Pass 1 records every `:name` declaration with its absolute line index and
 * blanks the declaring line. Pass 2 replaces each label name, wherever it
 * occurs in the remaining text, with that index. Longer names are substituted
 * first so that a label whose name contains another label's name is never
 * partially rewritten.
 */

import { ProgramValidityError } from '../errors.js';
import { LABEL_MARKER } from './syntax.js';

export interface ResolvedProgram {
  lines: string[];
  labels: Map<string, number>;
}

export function resolveLabels(source: readonly string[]): ResolvedProgram {
  const labels = new Map<string, number>();
  const lines = source.map((line, index) => {
    const trimmed = line.trim();
    if (!trimmed.startsWith(LABEL_MARKER)) {
      return line;
    }

    const name = trimmed.substring(LABEL_MARKER.length);
    if (name === '') {
      throw new ProgramValidityError('Label declaration without a name', index);
    }
    const previous = labels.get(name);
    if (previous !== undefined) {
      throw new ProgramValidityError(
        `Label with name ${name} has been reused (first declared at line ${previous}), invalid program`,
        index
      );
    }
    labels.set(name, index);
    return '';
  });

  // Map iteration follows declaration order, and sort is stable
  const order = [...labels.entries()].sort(([a], [b]) => b.length - a.length);

  return {
    lines: lines.map((line) =>
      order.reduce((text, [name, index]) => text.split(name).join(String(index)), line)
    ),
    labels,
  };
}
