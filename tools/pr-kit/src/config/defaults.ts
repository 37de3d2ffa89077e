import * as fs from 'node:fs';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import { parse as parseYaml } from 'yaml';
import { originConfigFileSchema } from './schema.js';
import type { OriginConfigFile } from './schema.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const defaultYamlPath = path.resolve(__dirname, '../../config/default-config.yaml');

function loadDefaultConfig(): OriginConfigFile {
  const raw = fs.readFileSync(defaultYamlPath, 'utf-8');
  const parsed: unknown = parseYaml(raw);
  const result = originConfigFileSchema.safeParse(parsed);
  if (!result.success) {
    throw new Error(
      `Invalid default config: ${result.error.issues.map((i) => i.message).join(', ')}`
    );
  }
  return result.data;
}

export const defaultConfig: OriginConfigFile = loadDefaultConfig();
