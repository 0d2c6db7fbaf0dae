// src/index.ts

export * from './core/errors';
export * from './core/settings';
export * from './core/modules';
export * from './core/extensions';
export { Logger, LogLevel, ScopedLogger } from './core/logging/Logger';
export { Host } from './host/Host';
export type { HostOptions, LoadReport, StartResult } from './host/Host';
export { NpmInstaller } from './infrastructure/installer/NpmInstaller';
export type { InstallOptions, InstallResult, PackageInstaller } from './infrastructure/installer/types';
export { NodeProcessRunner } from './infrastructure/process/ProcessRunner';
export type { ProcessRunner, RunOptions, RunResult } from './infrastructure/process/ProcessRunner';
export { createAdminServer, serveAdmin } from './interface/mcp/tools';
export { callAdminTool } from './interface/mcp/adminTools';
