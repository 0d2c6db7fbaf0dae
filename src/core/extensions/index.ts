export * from './ExtensionImporter';
export * from './ExtensionLoader';
export * from './HandlerRegistry';
