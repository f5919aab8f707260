import fs from 'node:fs/promises';
import path from 'node:path';

import { HELP_TEXT, parseArguments } from '../cli/ArgumentParser.js';
import { FINISHED_MESSAGE, QUIT_MESSAGE } from '../config/constants.js';
import { ConfigGenerator } from '../configfile/ConfigGenerator.js';
import type { DatabaseCredentials } from '../configfile/ConfigGenerator.js';
import { DatabaseProvisioner } from '../database/DatabaseProvisioner.js';
import type { DatabaseOutcome } from '../database/DatabaseProvisioner.js';
import { describeOsFamily, detectEnvironment } from '../environment/EnvironmentDetector.js';
import { ShellProfile } from '../environment/ShellProfile.js';
import { CommandExecutor } from '../execution/CommandExecutor.js';
import { FrameworkFetcher } from '../fetch/FrameworkFetcher.js';
import { RunnerFetcher } from '../fetch/RunnerFetcher.js';
import { TestLibraryFetcher } from '../fetch/TestLibraryFetcher.js';
import { ArchiveUnpacker, RsyncSyncer, SvnExporter, WgetFetcher } from '../integrations/ShellTransfer.js';
import { CliPhpRuntime, MysqlClient, SystemPackageManager, WhichToolLocator } from '../integrations/ShellSystem.js';
import { PrerequisiteInstaller } from '../prerequisites/PrerequisiteInstaller.js';
import type { Logger } from '../shared/logger.js';
import type {
  CliOptions,
  CommandRunner,
  DbClient,
  EnvironmentInfo,
  Exporter,
  Fetcher,
  PackageManager,
  PhpRuntime,
  ProvisionPaths,
  Settings,
  StepResult,
  Syncer,
  TestLibraryChannel,
  ToolLocator,
  Unpacker
} from '../shared/types.js';
import {
  VersionResolver,
  selectRunnerVersion,
  toFrameworkChannel,
  toTestLibraryChannel
} from '../versions/VersionResolver.js';
import { TempWorkspace } from '../workspace/TempWorkspace.js';
import { ProvisionError } from './ProvisionError.js';
import { TaskPhaseTracker } from './TaskPhaseTracker.js';
import type { ProvisionPhaseId, TrackedPhase } from './TaskPhaseTracker.js';

export type ProvisionResult = {
  runnerVersion: string;
  frameworkVersion: string;
  testLibrary: TestLibraryChannel;
  paths: ProvisionPaths;
  database: DatabaseOutcome;
  phases: TrackedPhase[];
};

export type ProvisionerComponents = {
  settings: Settings;
  logger: Logger;
  environment: EnvironmentInfo;
  workspace: TempWorkspace;
  shellProfile: ShellProfile;
  prerequisites: PrerequisiteInstaller;
  php: PhpRuntime;
  versions: VersionResolver;
  runnerFetcher: RunnerFetcher;
  frameworkFetcher: FrameworkFetcher;
  testLibraryFetcher: TestLibraryFetcher;
  configGenerator: ConfigGenerator;
  database: DatabaseProvisioner;
};

/**
 * Runs the whole setup: packages, PHPUnit, WordPress, the test suite, the
 * tests config and the test database, in that order.
 */
export class PhpUnitProvisioner {
  private readonly components: ProvisionerComponents;

  constructor(components: ProvisionerComponents) {
    this.components = components;
  }

  get workspace(): TempWorkspace {
    return this.components.workspace;
  }

  /**
   * Parses the command line and provisions. Resolves with the process exit code.
   */
  async runFromArguments(argv: string[]): Promise<number> {
    const { logger } = this.components;
    const parsed = parseArguments(argv);

    switch (parsed.kind) {
      case 'help':
        logger.info(HELP_TEXT);
        return 0;
      case 'usage-error':
        logger.info(parsed.message);
        logger.info(QUIT_MESSAGE);
        await this.cleanupAfterFailure();
        return 1;
      case 'run':
        try {
          await this.provision(parsed.options);
          return 0;
        } catch (error) {
          logger.error(error instanceof Error ? error.message : String(error));
          logger.info(QUIT_MESSAGE);
          await this.cleanupAfterFailure();
          return 1;
        }
    }
  }

  async provision(options: CliOptions): Promise<ProvisionResult> {
    const {
      settings,
      logger,
      environment,
      workspace,
      shellProfile,
      prerequisites,
      php,
      versions,
      runnerFetcher,
      frameworkFetcher,
      testLibraryFetcher,
      configGenerator,
      database
    } = this.components;
    const tracker = new TaskPhaseTracker();
    const credentials: DatabaseCredentials = {
      dbName: settings.dbName,
      dbUser: settings.dbUser,
      dbPassword: settings.dbPassword
    };

    await this.runPhase(tracker, 'environment', async () => {
      logger.info(describeOsFamily(environment.osFamily));
      return success({ osFamily: environment.osFamily, publicDir: environment.publicDir ?? null });
    });

    await this.runPhase(tracker, 'prerequisites', () =>
      prerequisites.ensure(environment.osFamily, options.updatePackages)
    );

    const runnerVersion = options.runnerVersion ?? selectRunnerVersion(await php.version());
    await this.runPhase(tracker, 'runner', () => runnerFetcher.install(runnerVersion), { runnerVersion });

    const paths = await this.runPhase(tracker, 'paths', () =>
      shellProfile.loadOrCreatePaths(
        {
          coreDir: path.join(settings.tmpDir, 'wordpress'),
          testsDir: path.join(settings.tmpDir, 'wordpress-tests-lib')
        },
        logger
      )
    );

    await workspace.cleanup();
    await workspace.createStagingDirectories();
    await fs.mkdir(paths.coreDir, { recursive: true });
    await fs.mkdir(paths.testsDir, { recursive: true });

    const frameworkVersion = await this.runPhase(tracker, 'framework', async (): Promise<StepResult<string>> => {
      const resolved = await versions.resolveFrameworkVersion(options.frameworkVersion);
      if (resolved.status !== 'success') {
        return resolved;
      }
      const installed = await frameworkFetcher.install(toFrameworkChannel(resolved.value), paths.coreDir);
      return installed.status === 'success' ? success(resolved.value) : installed;
    });

    const requestedTestLibrary = options.testLibraryVersion ?? frameworkVersion;
    const testLibrary = await this.runPhase(
      tracker,
      'test-library',
      () => testLibraryFetcher.install(toTestLibraryChannel(requestedTestLibrary, frameworkVersion), paths.testsDir),
      { requested: requestedTestLibrary }
    );

    await this.runPhase(tracker, 'config', () =>
      configGenerator.generate({
        paths,
        credentials,
        osFamily: environment.osFamily,
        publicDir: environment.publicDir
      })
    );

    const databaseOutcome = await this.runPhase(tracker, 'database', () => database.provision(credentials));

    await this.runPhase(tracker, 'cleanup', async () => {
      await workspace.cleanup();
      return success(undefined);
    });

    logger.info(`\n${FINISHED_MESSAGE}\n`);
    return {
      runnerVersion,
      frameworkVersion,
      testLibrary,
      paths,
      database: databaseOutcome,
      phases: tracker.getPhases()
    };
  }

  /**
   * Starts a phase, and completes it on success or fails it and throws a ProvisionError.
   */
  private async runPhase<T>(
    tracker: TaskPhaseTracker,
    phaseId: ProvisionPhaseId,
    step: () => Promise<StepResult<T>>,
    meta: Record<string, unknown> = {}
  ): Promise<T> {
    tracker.start(phaseId, meta);
    let result: StepResult<T>;
    try {
      result = await step();
    } catch (error) {
      const failure = error instanceof Error ? error : new Error(String(error));
      tracker.fail(phaseId, failure);
      throw new ProvisionError(failure.message, tracker.getPhases(), { cause: error, phaseId });
    }

    if (result.status !== 'success') {
      tracker.fail(phaseId, result.message, { status: result.status });
      throw new ProvisionError(result.message, tracker.getPhases(), { phaseId });
    }
    tracker.complete(phaseId);
    return result.value;
  }

  private async cleanupAfterFailure(): Promise<void> {
    try {
      await this.components.workspace.cleanup();
    } catch (error) {
      this.components.logger.warn(
        `Could not remove temporary files: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }
}

function success<T>(value: T): StepResult<T> {
  return { status: 'success', value };
}

export type ProvisionerCapabilities = {
  fetcher: Fetcher;
  exporter: Exporter;
  unpacker: Unpacker;
  syncer: Syncer;
  dbClient: DbClient;
  locator: ToolLocator;
  packageManager: PackageManager;
  php: PhpRuntime;
};

/**
 * Capabilities backed by wget, svn, tar/unzip, rsync and the MySQL clients.
 */
export function createShellCapabilities(runner: CommandRunner, logger: Logger): ProvisionerCapabilities {
  return {
    fetcher: new WgetFetcher(runner),
    exporter: new SvnExporter(runner),
    unpacker: new ArchiveUnpacker(runner),
    syncer: new RsyncSyncer(runner),
    dbClient: new MysqlClient(runner),
    locator: new WhichToolLocator(runner),
    packageManager: new SystemPackageManager(runner, logger),
    php: new CliPhpRuntime(runner)
  };
}

/**
 * Factory helper to create a fully wired PhpUnitProvisioner.
 */
export function createPhpUnitProvisioner(options: {
  settings: Settings;
  logger: Logger;
  capabilities?: ProvisionerCapabilities;
  environment?: EnvironmentInfo;
  processEnv?: NodeJS.ProcessEnv;
  versionCheckUrl?: string;
}): PhpUnitProvisioner {
  const { settings, logger } = options;
  const capabilities =
    options.capabilities ??
    createShellCapabilities(new CommandExecutor({ timeoutMs: settings.commandTimeoutMs }), logger);
  const environment = options.environment ?? detectEnvironment();
  const workspace = new TempWorkspace(settings.tmpDir);
  const shellProfile = new ShellProfile(settings.shellProfile, { processEnv: options.processEnv });

  return new PhpUnitProvisioner({
    settings,
    logger,
    environment,
    workspace,
    shellProfile,
    prerequisites: new PrerequisiteInstaller({
      locator: capabilities.locator,
      packageManager: capabilities.packageManager,
      shellProfile,
      logger,
      binDir: settings.binDir,
      composerInstaller: workspace.composerInstaller
    }),
    php: capabilities.php,
    versions: new VersionResolver(capabilities.fetcher, { versionCheckUrl: options.versionCheckUrl }),
    runnerFetcher: new RunnerFetcher(capabilities.fetcher, workspace, logger, settings.binDir),
    frameworkFetcher: new FrameworkFetcher({ ...capabilities, workspace, logger }),
    testLibraryFetcher: new TestLibraryFetcher({ ...capabilities, workspace, logger }),
    configGenerator: new ConfigGenerator(workspace, logger),
    database: new DatabaseProvisioner(capabilities.dbClient, workspace.credentialsFile, logger)
  });
}
