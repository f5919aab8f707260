export * from './config/constants.js';
export { parseArguments, HELP_TEXT, HELP_HINT } from './cli/ArgumentParser.js';
export { detectEnvironment, detectOsFamily, resolvePublicDir, describeOsFamily } from './environment/EnvironmentDetector.js';
export { ShellProfile } from './environment/ShellProfile.js';
export { CommandExecutor, succeeded } from './execution/CommandExecutor.js';
export { PrerequisiteInstaller } from './prerequisites/PrerequisiteInstaller.js';
export type { PrerequisiteReport } from './prerequisites/PrerequisiteInstaller.js';
export {
  VersionResolver,
  selectRunnerVersion,
  toFrameworkChannel,
  toTestLibraryChannel,
  archivePath,
  parseLatestVersion
} from './versions/VersionResolver.js';
export { downloadFile } from './fetch/download.js';
export { RunnerFetcher, runnerDownloadUrl } from './fetch/RunnerFetcher.js';
export { FrameworkFetcher, releaseArchiveUrl } from './fetch/FrameworkFetcher.js';
export { TestLibraryFetcher, testLibraryBaseUrl } from './fetch/TestLibraryFetcher.js';
export { ConfigGenerator, applyCredentials, renderTestsConfig } from './configfile/ConfigGenerator.js';
export type { DatabaseCredentials, ConfigGeneratorResult } from './configfile/ConfigGenerator.js';
export { DatabaseProvisioner, renderClientCredentials } from './database/DatabaseProvisioner.js';
export type { DatabaseOutcome } from './database/DatabaseProvisioner.js';
export { TempWorkspace } from './workspace/TempWorkspace.js';
export { ArchiveUnpacker, RsyncSyncer, SvnExporter, WgetFetcher } from './integrations/ShellTransfer.js';
export { CliPhpRuntime, MysqlClient, SystemPackageManager, WhichToolLocator } from './integrations/ShellSystem.js';
export {
  PhpUnitProvisioner,
  createPhpUnitProvisioner,
  createShellCapabilities
} from './core/PhpUnitProvisioner.js';
export type { ProvisionResult, ProvisionerCapabilities, ProvisionerComponents } from './core/PhpUnitProvisioner.js';
export { TaskPhaseTracker } from './core/TaskPhaseTracker.js';
export type { ProvisionPhaseId, TrackedPhase } from './core/TaskPhaseTracker.js';
export { ProvisionError } from './core/ProvisionError.js';
export { createConsoleLogger } from './shared/logger.js';
export type { Logger } from './shared/logger.js';

export type * from './shared/types.js';
