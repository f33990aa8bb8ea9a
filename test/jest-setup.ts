import { mkdtempSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';

process.env.RECOLLECT_CONFIG_DIR = mkdtempSync(join(tmpdir(), 'recollect-jest-'));
