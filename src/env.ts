import fs from 'fs/promises';
import path from 'path';
import { isLayoutVariant, LAYOUT_VARIANTS, LayoutVariant } from './types.js';

export interface AppConfig {
  port: number;
  outputDir: string;
  defaultVariant: LayoutVariant;
  uploadLimit: string;
  webPassword: string;
}

const DEFAULT_PORT = 8787;

export async function loadDotEnv(envPath: string = path.join(process.cwd(), '.env')): Promise<void> {
  let content: string;
  try {
    content = await fs.readFile(envPath, 'utf-8');
  } catch {
    // No .env file found; skip.
    return;
  }

  for (const line of content.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) {
      continue;
    }
    const idx = trimmed.indexOf('=');
    if (idx <= 0) {
      continue;
    }
    const key = trimmed.slice(0, idx).trim();
    let value = trimmed.slice(idx + 1).trim();
    if ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'"))) {
      value = value.slice(1, -1);
    }
    if (!process.env[key]) {
      process.env[key] = value;
    }
  }
}

export function resolveConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const port = Number.parseInt(env.PORT || String(DEFAULT_PORT), 10);

  const variant = (env.LABEL_VARIANT || 'v1').trim().toLowerCase();
  if (!isLayoutVariant(variant)) {
    console.warn(`[env] Ignoring LABEL_VARIANT="${env.LABEL_VARIANT}", expected ${LAYOUT_VARIANTS.join(' or ')}`);
  }

  return Object.freeze({
    port: Number.isFinite(port) && port >= 0 ? port : DEFAULT_PORT,
    outputDir: path.resolve(env.LABEL_OUTPUT_DIR || path.join(process.cwd(), 'labels')),
    defaultVariant: isLayoutVariant(variant) ? variant : 'v1',
    uploadLimit: env.LABEL_UPLOAD_LIMIT || '10mb',
    webPassword: env.LABELS_WEB_PASSWORD || ''
  });
}
