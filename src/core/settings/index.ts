export * from './values';
export * from './ObserverRegistry';
export * from './SettingsNode';
export * from './Setting';
export * from './SettingsGroup';
export * from './settingsFile';
export { parseSchemaDocument, parseValueLiteral, UNRECOGNISED_MARKER, DISABLED_MARKER } from './tomlDocument';
export type { SchemaEntry, SchemaSetting, SchemaTable } from './tomlDocument';
