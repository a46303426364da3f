import fs from 'node:fs';
import path from 'node:path';

function readJson(filePath: string): unknown {
  const raw = fs.readFileSync(filePath, 'utf8');
  return JSON.parse(raw);
}

/** Every `*.json` file in `dirPath`, by file name; none when it is missing. */
function readJsonFiles(dirPath: string): unknown[] {
  if (!fs.existsSync(dirPath)) {
    return [];
  }
  const entries = fs
    .readdirSync(dirPath)
    .filter((name) => name.endsWith('.json'))
    .sort()
    .map((name) => path.join(dirPath, name));

  return entries.map((entry) => readJson(entry));
}

function ensureDir(dirPath: string): void {
  if (!fs.existsSync(dirPath)) {
    fs.mkdirSync(dirPath, { recursive: true });
  }
}

export { ensureDir, readJson, readJsonFiles };
