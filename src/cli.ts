#!/usr/bin/env node
// Analyse text from stdin and print the score card
import readline from 'node:readline';
import { INPUT_REQUIRED } from './analysis/analysis.constants';
import { analyze } from './analysis/pipeline';
import { formatSummary } from './analysis/presentation';
import { mathRandom, RandomSource } from './analysis/random';

export const runCli = (input: string, random: RandomSource = mathRandom): { code: number; output: string } => {
  const result = analyze(input, random);
  if (!result) return { code: 1, output: INPUT_REQUIRED };
  return { code: 0, output: formatSummary(result) };
};

if (require.main === module) {
  const rl = readline.createInterface({ input: process.stdin });
  const lines: string[] = [];

  rl.on('line', (line) => lines.push(line));
  rl.on('close', () => {
    const { code, output } = runCli(lines.join('\n'));
    (code === 0 ? process.stdout : process.stderr).write(`${output}\n`);
    process.exitCode = code;
  });
}
