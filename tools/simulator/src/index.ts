import { formatMarkdownSummary, runSimulation } from './lib';

const args = process.argv.slice(2);
const operators = Number(args[0] ?? 20);
const steps = Number(args[1] ?? 1000);
const seed = Number(args[2] ?? 42);

const report = runSimulation({ operators, steps, seed });
console.log(JSON.stringify(report, null, 2));
console.log('\n---\n');
console.log(formatMarkdownSummary(report));

if (report.violations.length > 0) {
  process.exitCode = 1;
}
