import * as fs from 'node:fs';
import * as path from 'node:path';

export function writeOutput(content: string, outputPath?: string): void {
  if (outputPath) {
    const resolved = path.resolve(outputPath);
    fs.mkdirSync(path.dirname(resolved), { recursive: true });
    fs.writeFileSync(resolved, content);
    process.stderr.write(`Written to ${resolved}\n`);
  } else {
    process.stdout.write(content);
  }
}

export function formatJson(value: unknown, pretty: boolean): string {
  return JSON.stringify(value, null, pretty ? 2 : 0) + '\n';
}
