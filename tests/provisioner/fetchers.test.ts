import assert from 'node:assert/strict';
import fs from 'node:fs/promises';
import path from 'node:path';

import {
  FrameworkFetcher,
  RunnerFetcher,
  TempWorkspace,
  TestLibraryFetcher,
  releaseArchiveUrl,
  runnerDownloadUrl,
  testLibraryBaseUrl
} from '../../src/provisioner/index.js';
import {
  FakeExporter,
  FakeFetcher,
  FakeUnpacker,
  InProcessSyncer,
  RecordingLogger
} from '../helpers/fakes.js';
import { SAMPLE_TESTS_CONFIG, createTestDir, listTree, pathExists, writeTree } from '../helpers/testEnvironment.js';
import type { FileTree } from '../helpers/testEnvironment.js';

const WORDPRESS_TREE = {
  'wp-load.php': '<?php // load',
  'wp-includes': { 'version.php': "<?php $wp_version = '5.0';" }
};

export default async function runFetcherTests() {
  testUrls();
  await testRunnerInstall();
  await testRunnerDownloadFailure();
  await testFrameworkRelease();
  await testFrameworkNightly();
  await testFrameworkTrunk();
  await testFrameworkDownloadFailure();
  await testTestLibraryTagged();
  await testTestLibraryFallsBackToTrunk();
  await testTestLibraryTrunkFailureIsFatal();
  await testTestLibraryIncompleteExport();
}

function testUrls() {
  assert.equal(runnerDownloadUrl('7'), 'https://phar.phpunit.de/phpunit-7.phar');
  assert.equal(releaseArchiveUrl('5.0'), 'https://wordpress.org/wordpress-5.0.tar.gz');
  assert.equal(testLibraryBaseUrl({ kind: 'trunk' }), 'https://develop.svn.wordpress.org/trunk/');
  assert.equal(
    testLibraryBaseUrl({ kind: 'tagged', version: '5.0' }),
    'https://develop.svn.wordpress.org/tags/5.0/'
  );
}

async function setup(name: string) {
  const dir = await createTestDir(name);
  const workspace = new TempWorkspace(path.join(dir, 'tmp'));
  await workspace.createStagingDirectories();
  return { dir, workspace, logger: new RecordingLogger() };
}

function testLibrarySources(archive: string): Record<string, string | FileTree> {
  const base = `https://develop.svn.wordpress.org/${archive}/`;
  return {
    [`${base}tests/phpunit/includes/`]: { 'bootstrap.php': '<?php // bootstrap' },
    [`${base}tests/phpunit/data/`]: { 'themedir1': { 'style.css': '/* theme */' } },
    [`${base}wp-tests-config-sample.php`]: SAMPLE_TESTS_CONFIG
  };
}

async function testRunnerInstall() {
  const { dir, workspace, logger } = await setup('runner-install');
  const binDir = path.join(dir, 'bin');
  await fs.mkdir(binDir, { recursive: true });
  await fs.writeFile(path.join(binDir, 'phpunit'), 'old runner');
  const fetcher = new FakeFetcher({ 'https://phar.phpunit.de/phpunit-7.phar': '#!/usr/bin/env php\nphar' });
  const runnerFetcher = new RunnerFetcher(fetcher, workspace, logger, binDir);

  const result = await runnerFetcher.install('7');

  assert.deepEqual(result, { status: 'success', value: path.join(binDir, 'phpunit') });
  assert.equal(await fs.readFile(path.join(binDir, 'phpunit'), 'utf8'), '#!/usr/bin/env php\nphar');
  const stat = await fs.stat(path.join(binDir, 'phpunit'));
  assert.equal(stat.mode & 0o111, 0o111);
  assert.equal(await pathExists(workspace.runnerArchive('7')), false);
  assert.equal(logger.messages('info')[0], 'Installing PHPUnit 7...');
}

async function testRunnerDownloadFailure() {
  const { dir, workspace, logger } = await setup('runner-failure');
  const runnerFetcher = new RunnerFetcher(new FakeFetcher(), workspace, logger, path.join(dir, 'bin'));

  const result = await runnerFetcher.install('9');

  assert.deepEqual(result, { status: 'fatal', message: 'Could not install PHPUnit 9.' });
  assert.deepEqual(logger.messages('warn'), [
    "Could not download https://phar.phpunit.de/phpunit-9.phar Make sure you're connected to the internet."
  ]);
  assert.equal(await pathExists(path.join(dir, 'bin', 'phpunit')), false);
}

function createFrameworkFetcher(
  workspace: TempWorkspace,
  logger: RecordingLogger,
  options: { fetcher?: FakeFetcher; exporter?: FakeExporter } = {}
) {
  const syncer = new InProcessSyncer();
  const unpacker = new FakeUnpacker();
  const fetcher = new FrameworkFetcher({
    fetcher: options.fetcher ?? new FakeFetcher(),
    exporter: options.exporter ?? new FakeExporter(),
    unpacker,
    syncer,
    workspace,
    logger
  });
  return { fetcher, syncer, unpacker };
}

async function testFrameworkRelease() {
  const { dir, workspace, logger } = await setup('framework-release');
  const coreDir = path.join(dir, 'wordpress');
  await writeTree(coreDir, { 'stale.php': '<?php // removed upstream' });
  const { fetcher, syncer, unpacker } = createFrameworkFetcher(workspace, logger, {
    fetcher: new FakeFetcher({
      'https://wordpress.org/wordpress-5.0.tar.gz': FakeFetcher.archive({ wordpress: WORDPRESS_TREE })
    })
  });

  const result = await fetcher.install({ kind: 'tagged', version: '5.0' }, coreDir);

  assert.deepEqual(result, { status: 'success', value: undefined });
  assert.deepEqual(await listTree(coreDir), ['wp-includes/version.php', 'wp-load.php']);
  assert.equal(unpacker.calls[0].stripComponents, 1);
  assert.deepEqual(syncer.calls, [{ source: workspace.coreStaging, destination: coreDir }]);
  assert.deepEqual(logger.messages('info'), ['Installing WordPress 5.0...']);
}

async function testFrameworkNightly() {
  const { dir, workspace, logger } = await setup('framework-nightly');
  const coreDir = path.join(dir, 'wordpress');
  const { fetcher, syncer } = createFrameworkFetcher(workspace, logger, {
    fetcher: new FakeFetcher({
      'https://wordpress.org/nightly-builds/wordpress-latest.zip': FakeFetcher.archive({ wordpress: WORDPRESS_TREE })
    })
  });

  const result = await fetcher.install({ kind: 'nightly' }, coreDir);

  assert.equal(result.status, 'success');
  assert.deepEqual(await listTree(coreDir), ['wp-includes/version.php', 'wp-load.php']);
  assert.deepEqual(syncer.calls, [
    { source: path.join(workspace.coreStaging, 'wordpress'), destination: coreDir }
  ]);
}

async function testFrameworkTrunk() {
  const { dir, workspace, logger } = await setup('framework-trunk');
  const coreDir = path.join(dir, 'wordpress');
  const exporter = new FakeExporter({ 'https://develop.svn.wordpress.org/trunk/src/': WORDPRESS_TREE });
  const { fetcher } = createFrameworkFetcher(workspace, logger, { exporter });

  const result = await fetcher.install({ kind: 'trunk' }, coreDir);

  assert.equal(result.status, 'success');
  assert.deepEqual(exporter.exports, [
    { url: 'https://develop.svn.wordpress.org/trunk/src/', destination: workspace.coreStaging }
  ]);
  assert.deepEqual(await listTree(coreDir), ['wp-includes/version.php', 'wp-load.php']);
}

async function testFrameworkDownloadFailure() {
  const { dir, workspace, logger } = await setup('framework-failure');
  const { fetcher, syncer } = createFrameworkFetcher(workspace, logger);

  const result = await fetcher.install({ kind: 'tagged', version: '4.9' }, path.join(dir, 'wordpress'));

  assert.deepEqual(result, { status: 'fatal', message: 'Could not install WordPress 4.9.' });
  assert.deepEqual(logger.messages('warn'), [
    "Could not download https://wordpress.org/wordpress-4.9.tar.gz Make sure you're connected to the internet."
  ]);
  assert.deepEqual(syncer.calls, []);
}

function createTestLibraryFetcher(
  workspace: TempWorkspace,
  logger: RecordingLogger,
  fetcher: FakeFetcher,
  exporter: FakeExporter
) {
  return new TestLibraryFetcher({ fetcher, exporter, syncer: new InProcessSyncer(), workspace, logger });
}

async function testTestLibraryTagged() {
  const { dir, workspace, logger } = await setup('library-tagged');
  const testsDir = path.join(dir, 'wordpress-tests-lib');
  const exporter = new FakeExporter(testLibrarySources('tags/5.0'));
  const fetcher = new FakeFetcher({}, ['https://develop.svn.wordpress.org/tags/5.0/tests/phpunit/includes/']);

  const result = await createTestLibraryFetcher(workspace, logger, fetcher, exporter).install(
    { kind: 'tagged', version: '5.0' },
    testsDir
  );

  assert.deepEqual(result, { status: 'success', value: { kind: 'tagged', version: '5.0' } });
  assert.deepEqual(await listTree(testsDir), [
    'data/themedir1/style.css',
    'includes/bootstrap.php',
    'wp-tests-config.php'
  ]);
  assert.equal(await fs.readFile(path.join(testsDir, 'wp-tests-config.php'), 'utf8'), SAMPLE_TESTS_CONFIG);
  assert.deepEqual(logger.messages('info'), ['Installing WordPress 5.0 Test Suite...']);
}

async function testTestLibraryFallsBackToTrunk() {
  const { dir, workspace, logger } = await setup('library-fallback');
  const testsDir = path.join(dir, 'wordpress-tests-lib');
  const exporter = new FakeExporter(testLibrarySources('trunk'));
  const fetcher = new FakeFetcher({}, ['https://develop.svn.wordpress.org/trunk/tests/phpunit/includes/']);

  const result = await createTestLibraryFetcher(workspace, logger, fetcher, exporter).install(
    { kind: 'tagged', version: '9.9' },
    testsDir
  );

  assert.deepEqual(result, { status: 'success', value: { kind: 'trunk' } });
  assert.deepEqual(fetcher.reachabilityChecks, [
    'https://develop.svn.wordpress.org/tags/9.9/tests/phpunit/includes/',
    'https://develop.svn.wordpress.org/trunk/tests/phpunit/includes/'
  ]);
  assert.deepEqual(logger.messages('warn'), [
    "Could not download 9.9 Test Suite. Make sure you're connected to the internet."
  ]);
  assert.deepEqual(logger.messages('info'), [
    'Installing WordPress 9.9 Test Suite...',
    'Installing Test Suite from trunk...'
  ]);
  assert.deepEqual(await listTree(testsDir), [
    'data/themedir1/style.css',
    'includes/bootstrap.php',
    'wp-tests-config.php'
  ]);
}

async function testTestLibraryTrunkFailureIsFatal() {
  const { dir, workspace, logger } = await setup('library-trunk-failure');
  const fetcher = new FakeFetcher();
  const exporter = new FakeExporter();

  const result = await createTestLibraryFetcher(workspace, logger, fetcher, exporter).install(
    { kind: 'trunk' },
    path.join(dir, 'wordpress-tests-lib')
  );

  assert.deepEqual(result, { status: 'fatal', message: 'Could not install the WordPress test suite.' });
  assert.equal(fetcher.reachabilityChecks.length, 1);
  assert.deepEqual(exporter.exports, []);
}

async function testTestLibraryIncompleteExport() {
  const { dir, workspace, logger } = await setup('library-incomplete');
  const sources = testLibrarySources('tags/5.0');
  delete sources['https://develop.svn.wordpress.org/tags/5.0/tests/phpunit/data/'];
  const exporter = new FakeExporter(sources);
  const fetcher = new FakeFetcher({}, ['https://develop.svn.wordpress.org/tags/5.0/tests/phpunit/includes/']);

  const result = await createTestLibraryFetcher(workspace, logger, fetcher, exporter).install(
    { kind: 'tagged', version: '5.0' },
    path.join(dir, 'wordpress-tests-lib')
  );

  assert.deepEqual(result, { status: 'fatal', message: 'Could not install the WordPress test suite.' });
  assert.equal(exporter.exports.length, 3);
  assert.deepEqual(logger.messages('warn'), [
    "Could not download 5.0 Test Suite. Make sure you're connected to the internet.",
    "Could not download trunk Test Suite. Make sure you're connected to the internet."
  ]);
}
