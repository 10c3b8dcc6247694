import fs from 'node:fs';
import path from 'node:path';

const PROJECT_ROOT = path.resolve(__dirname, '..', '..');
const DATA_DIR = path.join(PROJECT_ROOT, 'data');
const REPORTS_DIR = path.join(PROJECT_ROOT, 'reports');

export const GENERATED_PATHS = [
  path.join(DATA_DIR, 'raw'),
  path.join(DATA_DIR, 'processed'),
  REPORTS_DIR,
];

function removePath(target: string): void {
  if (!fs.existsSync(target)) return;
  fs.rmSync(target, { recursive: true, force: true });
  console.info(`Removed ${target}`);
}

export function cleanOutputs(targets: readonly string[] = GENERATED_PATHS): void {
  targets.forEach(removePath);
}

if (require.main === module) {
  cleanOutputs();
}
