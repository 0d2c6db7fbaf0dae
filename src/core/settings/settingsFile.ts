// src/core/settings/settingsFile.ts

import { mkdir, readFile, writeFile } from 'fs/promises';
import path from 'path';
import { Logger } from '../logging/Logger';
import { SchemaError } from '../errors';
import { SettingsGroup } from './SettingsGroup';
import { PlainValue, toPlain } from './values';
import { parseDocument, parseValueLiteral } from './tomlDocument';

/**
 * Reads a persisted settings file into plain nested data.
 */
export async function loadSettingsFile(filePath: string): Promise<Record<string, unknown>> {
    const source = await readFile(filePath, 'utf-8');
    try {
        return parseDocument(source);
    } catch (error) {
        if (error instanceof SchemaError) {
            throw new SchemaError(`${filePath}: ${error.message}`, { ...error.context, operation: 'loadSettingsFile' });
        }
        throw error;
    }
}

/**
 * Serializes a settings tree to disk, creating parent directories.
 */
export async function saveSettingsFile(filePath: string, settings: SettingsGroup): Promise<void> {
    Logger.info('Settings', `Saving settings to ${filePath}`);
    await mkdir(path.dirname(filePath), { recursive: true });
    await writeFile(filePath, settings.asDocument().trimEnd() + '\n', 'utf-8');
}

/**
 * Parses a value typed by an administrator, e.g. `["!", "?"]` or `0.5`.
 */
export function parseSettingLiteral(literal: string): PlainValue {
    return toPlain(parseValueLiteral(literal));
}
