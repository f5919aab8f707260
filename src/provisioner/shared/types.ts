export type OsFamily = 'mac' | 'other';

export type FrameworkChannel =
  | { kind: 'trunk' }
  | { kind: 'nightly' }
  | { kind: 'tagged'; version: string };

export type TestLibraryChannel = { kind: 'trunk' } | { kind: 'tagged'; version: string };

export type StepResult<T = void> =
  | { status: 'success'; value: T }
  | { status: 'retryable'; message: string }
  | { status: 'fatal'; message: string };

export type CliOptions = {
  runnerVersion?: string;
  frameworkVersion: string;
  testLibraryVersion?: string;
  updatePackages: boolean;
};

export type ParsedArguments =
  | { kind: 'run'; options: CliOptions }
  | { kind: 'help' }
  | { kind: 'usage-error'; token: string; message: string };

export type Settings = {
  dbName: string;
  dbUser: string;
  dbPassword: string;
  binDir: string;
  tmpDir: string;
  shellProfile: string;
  commandTimeoutMs: number;
};

/**
 * Locations of the fetched WordPress tree and test library.
 */
export type ProvisionPaths = {
  coreDir: string;
  testsDir: string;
};

export type EnvironmentInfo = {
  osFamily: OsFamily;
  cwd: string;
  publicDir?: string;
};

export type CommandResult = {
  command: string;
  arguments: string[];
  exitCode: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  error: string | null;
};

export type CommandHooks = {
  onStdout?: (chunk: string) => void;
  onStderr?: (chunk: string) => void;
};

export type CommandRunOptions = {
  cwd?: string;
  hooks?: CommandHooks;
};

export interface CommandRunner {
  run(command: string, args: string[], options?: CommandRunOptions): Promise<CommandResult>;
}

/**
 * Remote file access. `read` returns null when the body could not be fetched.
 */
export interface Fetcher {
  isReachable(url: string): Promise<boolean>;
  download(url: string, destination: string): Promise<boolean>;
  read(url: string): Promise<string | null>;
}

export interface Exporter {
  export(url: string, destination: string): Promise<boolean>;
}

export interface Unpacker {
  extractTarGz(archive: string, destination: string, options?: { stripComponents?: number }): Promise<boolean>;
  extractZip(archive: string, destination: string): Promise<boolean>;
}

export interface Syncer {
  mirror(source: string, destination: string): Promise<boolean>;
}

export interface DbClient {
  hasShowTool(): Promise<boolean>;
  showDatabase(name: string, credentialsFile: string): Promise<boolean>;
  useDatabase(name: string, credentialsFile: string): Promise<boolean>;
  createDatabase(name: string, credentialsFile: string): Promise<boolean>;
}

export interface ToolLocator {
  isInstalled(tool: string): Promise<boolean>;
}

export interface PackageManager {
  run(command: string, args: string[]): Promise<boolean>;
  capture(command: string, args: string[]): Promise<string | null>;
}

export interface PhpRuntime {
  version(): Promise<string | null>;
}
