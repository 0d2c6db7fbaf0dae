// src/core/settings/tomlDocument.ts

import { parse } from 'smol-toml';
import { SchemaError } from '../errors';
import { SettingValue, isPlainObject } from './values';

/**
 * Reading and writing of commented TOML documents.
 *
 * smol-toml validates the document and produces the values. It drops comments and
 * the integer/float distinction of literals like `1.0`, so a second pass walks the
 * raw text to recover statement order, comments and number kinds.
 */

export const UNRECOGNISED_MARKER = '⚠️ Unrecognised setting';
export const DISABLED_MARKER = '🚫 Disabled';

export interface SchemaSetting {
    kind: 'setting';
    key: string;
    description: string;
    value: SettingValue;
}

export interface SchemaTable {
    kind: 'group';
    key: string;
    description: string;
    entries: SchemaEntry[];
}

export type SchemaEntry = SchemaSetting | SchemaTable;

type Statement =
    | { kind: 'comment'; text: string }
    | { kind: 'header'; path: string[]; array: boolean; comment?: string; line: number }
    | { kind: 'entry'; keyPath: string[]; raw: string; comment?: string; line: number };

const BARE_KEY = /^[A-Za-z0-9_-]+$/;

// -------------------------------------------------------------------------
// Raw text scanning
// -------------------------------------------------------------------------

class Scanner {
    public pos = 0;
    public line = 1;

    constructor(private readonly source: string) { }

    public get done(): boolean {
        return this.pos >= this.source.length;
    }

    public peek(offset = 0): string {
        return this.source.charAt(this.pos + offset);
    }

    public startsWith(token: string): boolean {
        return this.source.startsWith(token, this.pos);
    }

    public advance(count = 1): void {
        for (let i = 0; i < count && !this.done; i++) {
            if (this.source.charAt(this.pos) === '\n') this.line++;
            this.pos++;
        }
    }

    public skipInlineSpace(): void {
        while (this.peek() === ' ' || this.peek() === '\t' || this.peek() === '\r') this.advance();
    }

    public slice(start: number): string {
        return this.source.slice(start, this.pos);
    }

    public readToEol(): string {
        const start = this.pos;
        while (!this.done && this.peek() !== '\n') this.advance();
        return this.slice(start).replace(/\r$/, '');
    }

    /**
     * Skips a string literal of any of the four TOML kinds, starting at its opening quote.
     */
    public skipString(): void {
        for (const delimiter of ['"""', "'''"]) {
            if (this.startsWith(delimiter)) {
                this.advance(3);
                while (!this.done && !this.startsWith(delimiter)) {
                    this.advance(delimiter === '"""' && this.peek() === '\\' ? 2 : 1);
                }
                this.advance(3);
                // Up to two quotes may sit directly before the closing delimiter
                while (this.peek() === delimiter.charAt(0)) this.advance();
                return;
            }
        }
        const quote = this.peek();
        this.advance();
        while (!this.done && this.peek() !== quote && this.peek() !== '\n') {
            this.advance(quote === '"' && this.peek() === '\\' ? 2 : 1);
        }
        this.advance();
    }

    public fail(message: string): never {
        throw new SchemaError(`${message} (line ${this.line})`);
    }
}

function unquote(text: string): string {
    if (text.startsWith("'")) return text.slice(1, -1);
    // Basic strings use the same escapes as JSON for everything a key reasonably holds
    try {
        return JSON.parse(text);
    } catch {
        return text.slice(1, -1);
    }
}

function readKeyPath(scanner: Scanner, terminators: string): string[] {
    const path: string[] = [];
    for (;;) {
        scanner.skipInlineSpace();
        const start = scanner.pos;
        if (scanner.peek() === '"' || scanner.peek() === "'") {
            scanner.skipString();
            path.push(unquote(scanner.slice(start)));
        } else {
            while (/[A-Za-z0-9_-]/.test(scanner.peek())) scanner.advance();
            const bare = scanner.slice(start);
            if (!bare) scanner.fail('Expected a key');
            path.push(bare);
        }
        scanner.skipInlineSpace();
        if (scanner.peek() === '.') {
            scanner.advance();
            continue;
        }
        if (!terminators.includes(scanner.peek())) scanner.fail(`Unexpected character '${scanner.peek()}'`);
        return path;
    }
}

/**
 * Reads a value up to the end of its statement, following brackets and strings
 * across lines. Stops before a trailing comment or the closing newline.
 */
function readValue(scanner: Scanner): string {
    const start = scanner.pos;
    let depth = 0;
    while (!scanner.done) {
        const c = scanner.peek();
        if (c === '"' || c === "'") {
            scanner.skipString();
            continue;
        }
        if (c === '[' || c === '{') depth++;
        else if (c === ']' || c === '}') depth--;
        else if (c === '#') {
            if (depth === 0) break;
            scanner.readToEol();
            continue;
        } else if (c === '\n' && depth === 0) break;
        scanner.advance();
    }
    return scanner.slice(start).trim();
}

function readTrailingComment(scanner: Scanner): string | undefined {
    scanner.skipInlineSpace();
    let comment: string | undefined;
    if (scanner.peek() === '#') {
        comment = stripComment(scanner.readToEol());
    }
    scanner.skipInlineSpace();
    if (!scanner.done && scanner.peek() !== '\n') scanner.fail('Expected end of line');
    scanner.advance();
    return comment;
}

/**
 * Removes the comment marker: leading `#` and space characters.
 */
function stripComment(text: string): string {
    return text.trim().replace(/^[# ]+/, '');
}

function scanStatements(source: string): Statement[] {
    const scanner = new Scanner(source);
    const statements: Statement[] = [];

    while (!scanner.done) {
        scanner.skipInlineSpace();
        const c = scanner.peek();
        if (c === '\n') {
            scanner.advance();
        } else if (c === '') {
            break;
        } else if (c === '#') {
            statements.push({ kind: 'comment', text: stripComment(scanner.readToEol()) });
        } else if (c === '[') {
            const line = scanner.line;
            const array = scanner.startsWith('[[');
            scanner.advance(array ? 2 : 1);
            const path = readKeyPath(scanner, ']');
            scanner.advance(array ? 2 : 1);
            statements.push({ kind: 'header', path, array, comment: readTrailingComment(scanner), line });
        } else {
            const line = scanner.line;
            const keyPath = readKeyPath(scanner, '=');
            scanner.advance();
            scanner.skipInlineSpace();
            const raw = readValue(scanner);
            statements.push({ kind: 'entry', keyPath, raw, comment: readTrailingComment(scanner), line });
        }
    }
    return statements;
}

type NumberKind = 'integer' | 'float';
type NumberKinds = Map<string, NumberKind>;

function kindKey(path: readonly string[]): string {
    return JSON.stringify(path);
}

function classifyNumber(token: string): NumberKind | undefined {
    if (/^[+-]?(inf|nan)$/.test(token)) return 'float';
    if (/^[+-]?0[xob]/.test(token)) return 'integer';
    if (/^[+-]?\d[\d_]*$/.test(token)) return 'integer';
    if (/^[+-]?\d[\d_]*(\.\d[\d_]*)?([eE][+-]?\d[\d_]*)?$/.test(token)) return 'float';
    return undefined;
}

/**
 * Skips spaces, newlines and comments between array items.
 */
function skipBlank(scanner: Scanner): void {
    for (;;) {
        scanner.skipInlineSpace();
        if (scanner.peek() === '\n') {
            scanner.advance();
        } else if (scanner.peek() === '#') {
            scanner.readToEol();
        } else {
            return;
        }
    }
}

/**
 * Records the kind of every number literal in a raw value, keyed by its path
 * of table keys and array indexes.
 */
function numberKinds(raw: string): NumberKinds {
    const kinds: NumberKinds = new Map();
    readKinds(new Scanner(raw), [], kinds);
    return kinds;
}

function readKinds(scanner: Scanner, path: string[], kinds: NumberKinds): void {
    skipBlank(scanner);
    const c = scanner.peek();
    if (c === '[') {
        scanner.advance();
        let index = 0;
        for (;;) {
            skipBlank(scanner);
            if (scanner.done) return;
            if (scanner.peek() === ']') {
                scanner.advance();
                return;
            }
            if (scanner.peek() === ',') {
                scanner.advance();
                index++;
                continue;
            }
            readKinds(scanner, [...path, String(index)], kinds);
        }
    }
    if (c === '{') {
        scanner.advance();
        for (;;) {
            scanner.skipInlineSpace();
            if (scanner.done) return;
            if (scanner.peek() === '}') {
                scanner.advance();
                return;
            }
            if (scanner.peek() === ',') {
                scanner.advance();
                continue;
            }
            const keyPath = readKeyPath(scanner, '=');
            scanner.advance();
            readKinds(scanner, [...path, ...keyPath], kinds);
        }
    }
    if (c === '"' || c === "'") {
        scanner.skipString();
        return;
    }
    const start = scanner.pos;
    while (/[A-Za-z0-9_.+:-]/.test(scanner.peek())) scanner.advance();
    const token = scanner.slice(start);
    if (!token) {
        scanner.advance();
        return;
    }
    const kind = classifyNumber(token);
    if (kind) kinds.set(kindKey(path), kind);
}

function toTypedValue(value: unknown, kinds: NumberKinds, where: string, path: string[] = []): SettingValue {
    if (typeof value === 'boolean') return { type: 'boolean', value };
    if (typeof value === 'string') return { type: 'string', value };
    if (typeof value === 'bigint') {
        if (value > BigInt(Number.MAX_SAFE_INTEGER) || value < BigInt(Number.MIN_SAFE_INTEGER)) {
            throw new SchemaError(`${where}: integer ${value} is outside the supported range`);
        }
        return { type: 'integer', value: Number(value) };
    }
    if (typeof value === 'number') {
        if (kinds.get(kindKey(path)) === 'float' || !Number.isSafeInteger(value)) return { type: 'float', value };
        return { type: 'integer', value };
    }
    if (Array.isArray(value)) {
        return {
            type: 'array',
            value: value.map((item, index) => toTypedValue(item, kinds, where, [...path, String(index)])),
        };
    }
    if (isPlainObject(value)) {
        const table: Record<string, SettingValue> = {};
        for (const [key, item] of Object.entries(value)) {
            table[key] = toTypedValue(item, kinds, where, [...path, key]);
        }
        return { type: 'table', value: table };
    }
    throw new SchemaError(`${where}: dates and times are not supported as setting values`);
}

function parseToml(source: string): Record<string, unknown> {
    try {
        return parse(source);
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new SchemaError(message, { details: error });
    }
}

// -------------------------------------------------------------------------
// Schema parsing
// -------------------------------------------------------------------------

function ensureTable(parent: SchemaTable, path: string[], line: number): SchemaTable {
    let table = parent;
    for (const key of path) {
        const existing = table.entries.find(entry => entry.key === key);
        if (existing && existing.kind === 'setting') {
            throw new SchemaError(`'${key}' is declared both as a value and as a table (line ${line})`);
        }
        if (existing) {
            table = existing;
        } else {
            const created: SchemaTable = { kind: 'group', key, description: '', entries: [] };
            table.entries.push(created);
            table = created;
        }
    }
    return table;
}

function lookup(document: Record<string, unknown>, path: string[]): unknown {
    let node: unknown = document;
    for (const key of path) {
        if (!isPlainObject(node)) return undefined;
        node = node[key];
    }
    return node;
}

function describeFrom(pending: string[], comment: string | undefined, marker: string): string {
    if (pending.length > 0) return pending.join('\n').trimEnd();
    if (comment && comment !== marker) return comment.trimEnd();
    return '';
}

/**
 * Parses a schema document into an ordered tree of tables and settings.
 *
 * Comment lines collect until the next key or table header and become its
 * description, so comments trailing the last entry of a table describe whatever
 * follows the table. A trailing comment on the same line is used only when no
 * comment lines precede the entry.
 */
export function parseSchemaDocument(source: string): SchemaTable {
    const document = parseToml(source);
    const root: SchemaTable = { kind: 'group', key: '', description: '', entries: [] };

    let current = root;
    let currentPath: string[] = [];
    let pending: string[] = [];

    for (const statement of scanStatements(source)) {
        if (statement.kind === 'comment') {
            pending.push(statement.text);
            continue;
        }

        if (statement.kind === 'header') {
            if (statement.array) {
                throw new SchemaError(`Arrays of tables are not supported in schemas (line ${statement.line})`);
            }
            current = ensureTable(root, statement.path, statement.line);
            currentPath = statement.path;
            current.description = describeFrom(pending, statement.comment, DISABLED_MARKER);
            pending = [];
            continue;
        }

        const parent = ensureTable(current, statement.keyPath.slice(0, -1), statement.line);
        const key = statement.keyPath[statement.keyPath.length - 1];
        const fullPath = [...currentPath, ...statement.keyPath];
        const value = toTypedValue(lookup(document, fullPath), numberKinds(statement.raw), fullPath.join('.'));
        parent.entries.push({
            kind: 'setting',
            key,
            description: describeFrom(pending, statement.comment, UNRECOGNISED_MARKER),
            value,
        });
        pending = [];
    }

    return root;
}

/**
 * Parses a TOML document into plain nested objects, as used for persisted settings files.
 */
export function parseDocument(source: string): Record<string, unknown> {
    return parseToml(source);
}

/**
 * Parses a single value literal such as `true`, `[1, 2]` or `"text"`.
 */
export function parseValueLiteral(literal: string): SettingValue {
    const source = `value = ${literal.trim()}\n`;
    const document = parseToml(source);
    const statements = scanStatements(source);
    const entry = statements.find(statement => statement.kind === 'entry');
    if (statements.length !== 1 || !entry || entry.kind !== 'entry') {
        throw new SchemaError(`'${literal}' is not a single value`);
    }
    return toTypedValue(document.value, numberKinds(entry.raw), 'value');
}

// -------------------------------------------------------------------------
// Emitting
// -------------------------------------------------------------------------

export function formatKey(key: string): string {
    return BARE_KEY.test(key) ? key : formatString(key);
}

function formatString(text: string): string {
    return JSON.stringify(text).replace(/\u007f/g, '\\u007f');
}

function formatFloat(value: number): string {
    if (Number.isNaN(value)) return 'nan';
    if (value === Infinity) return 'inf';
    if (value === -Infinity) return '-inf';
    const text = String(value);
    return /[.eE]/.test(text) ? text : `${text}.0`;
}

export function formatValue(value: SettingValue): string {
    switch (value.type) {
        case 'boolean':
            return value.value ? 'true' : 'false';
        case 'integer':
            return String(value.value);
        case 'float':
            return formatFloat(value.value);
        case 'string':
            return formatString(value.value);
        case 'array':
            return `[${value.value.map(formatValue).join(', ')}]`;
        case 'table': {
            const entries = Object.entries(value.value);
            if (entries.length === 0) return '{}';
            return `{ ${entries.map(([key, item]) => `${formatKey(key)} = ${formatValue(item)}`).join(', ')} }`;
        }
    }
}

export function formatComment(description: string): string[] {
    if (!description) return [];
    return description.split('\n').map(line => (line ? `# ${line}` : '#'));
}
