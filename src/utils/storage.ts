/**
 * Result File Storage
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { randomUUID } from 'node:crypto';
import path from 'node:path';
import { config } from '../config/index.js';
import { ResultFileError } from '../agent/errors.js';
import { logger } from './logger.js';
import type { ResultDocument } from '../types/pricing.js';

/**
 * Use the caller's path as given, otherwise generate one under `baseDir`
 */
export function resolveResultFilePath(
    serviceCode: string,
    explicitPath?: string,
    baseDir: string = config.storage.resultDir
): string {
    if (explicitPath) return explicitPath;

    const safeServiceCode = serviceCode.replace(/[^A-Za-z0-9_-]/g, '_');
    return path.join(baseDir, `aws_pricing_${safeServiceCode}_${randomUUID()}.json`);
}

/**
 * Write the result document as pretty-printed JSON, creating parent directories
 */
export async function writeResultFile(filePath: string, document: ResultDocument): Promise<void> {
    try {
        await mkdir(path.dirname(filePath), { recursive: true });
        await writeFile(filePath, JSON.stringify(document, null, 2), 'utf-8');
    } catch (error) {
        throw new ResultFileError(filePath, error);
    }

    logger.debug({ filePath, recordCount: document.record_count }, 'Saved result file');
}
