import assert from 'node:assert/strict';
import fs from 'node:fs/promises';
import path from 'node:path';

import { ConfigGenerator, TempWorkspace, applyCredentials, renderTestsConfig } from '../../src/provisioner/index.js';
import { RecordingLogger } from '../helpers/fakes.js';
import { SAMPLE_TESTS_CONFIG, createTestDir, pathExists, writeTree } from '../helpers/testEnvironment.js';

const CREDENTIALS = { dbName: 'wordpress_test', dbUser: 'root', dbPassword: 'root' };

const RENDERED_CONFIG = `<?php
define( 'ABSPATH', '/tmp/wordpress/' );
define( 'DB_NAME', 'wordpress_test' );
define( 'DB_USER', 'root' );
define( 'DB_PASSWORD', 'root' );
define( 'DB_HOST', 'localhost' );
$table_prefix = 'wptests_';
`;

export default async function runConfigGeneratorTests() {
  testRender();
  testRenderIsIdempotent();
  testReplacementPatternsStayLiteral();
  await testGenerateOnLinux();
  await testGenerateOnMacKeepsBackup();
  await testPublicSampleGetsCredentials();
  await testPublicDirWithoutSampleGetsCopy();
  await testMissingConfigIsFatal();
}

function testRender() {
  assert.equal(renderTestsConfig(SAMPLE_TESTS_CONFIG, '/tmp/wordpress', CREDENTIALS), RENDERED_CONFIG);
  assert.equal(renderTestsConfig(SAMPLE_TESTS_CONFIG, '/tmp/wordpress//', CREDENTIALS), RENDERED_CONFIG);
}

function testRenderIsIdempotent() {
  const once = renderTestsConfig(SAMPLE_TESTS_CONFIG, '/tmp/wordpress', CREDENTIALS);
  assert.equal(renderTestsConfig(once, '/tmp/wordpress', CREDENTIALS), once);
}

function testReplacementPatternsStayLiteral() {
  const rendered = applyCredentials("define( 'DB_PASSWORD', 'yourpasswordhere' );", {
    ...CREDENTIALS,
    dbPassword: 'test-$&-secret'
  });
  assert.equal(rendered, "define( 'DB_PASSWORD', 'test-$&-secret' );");
}

async function setup(name: string) {
  const dir = await createTestDir(name);
  const testsDir = path.join(dir, 'wordpress-tests-lib');
  await writeTree(testsDir, { 'wp-tests-config.php': SAMPLE_TESTS_CONFIG });
  const workspace = new TempWorkspace(path.join(dir, 'tmp'));
  const logger = new RecordingLogger();
  return { dir, testsDir, workspace, logger, generator: new ConfigGenerator(workspace, logger) };
}

async function testGenerateOnLinux() {
  const { testsDir, workspace, logger, generator } = await setup('config-linux');
  const configFile = path.join(testsDir, 'wp-tests-config.php');

  const result = await generator.generate({
    paths: { coreDir: '/tmp/wordpress', testsDir },
    credentials: CREDENTIALS,
    osFamily: 'other'
  });

  assert.deepEqual(result, { status: 'success', value: { configFile, copies: [workspace.configCopy] } });
  assert.equal(await fs.readFile(configFile, 'utf8'), RENDERED_CONFIG);
  assert.equal(await fs.readFile(workspace.configCopy, 'utf8'), RENDERED_CONFIG);
  assert.equal(await pathExists(`${configFile}.bak`), false);
  assert.deepEqual(logger.messages('info'), [
    'Updating wp-tests-config.php...',
    `'${configFile}' -> '${workspace.configCopy}'`
  ]);
}

async function testGenerateOnMacKeepsBackup() {
  const { testsDir, generator } = await setup('config-mac');
  const configFile = path.join(testsDir, 'wp-tests-config.php');

  await generator.generate({
    paths: { coreDir: '/tmp/wordpress', testsDir },
    credentials: CREDENTIALS,
    osFamily: 'mac'
  });

  assert.equal(await fs.readFile(`${configFile}.bak`, 'utf8'), SAMPLE_TESTS_CONFIG);
  assert.equal(await fs.readFile(configFile, 'utf8'), RENDERED_CONFIG);
}

async function testPublicSampleGetsCredentials() {
  const { dir, testsDir, workspace, logger, generator } = await setup('config-public-sample');
  const publicDir = path.join(dir, 'app', 'public');
  await writeTree(publicDir, {
    'wp-tests-config-sample.php': "<?php\ndefine( 'DB_NAME', 'youremptytestdbnamehere' );\ndefine( 'DB_PASSWORD', 'yourpasswordhere' );\n"
  });

  const result = await generator.generate({
    paths: { coreDir: '/tmp/wordpress', testsDir },
    credentials: { ...CREDENTIALS, dbPassword: 'test-secret' },
    osFamily: 'other',
    publicDir
  });

  const publicConfig = path.join(publicDir, 'wp-tests-config.php');
  assert.equal(result.status, 'success');
  if (result.status === 'success') {
    assert.deepEqual(result.value.copies, [workspace.configCopy, publicConfig]);
  }
  assert.equal(
    await fs.readFile(publicConfig, 'utf8'),
    "<?php\ndefine( 'DB_NAME', 'wordpress_test' );\ndefine( 'DB_PASSWORD', 'test-secret' );\n"
  );
  assert.ok(logger.messages('info').includes('Create credentials for wp-tests-config.php...'));
}

async function testPublicDirWithoutSampleGetsCopy() {
  const { dir, testsDir, generator } = await setup('config-public-copy');
  const publicDir = path.join(dir, 'app', 'public');
  await fs.mkdir(publicDir, { recursive: true });

  await generator.generate({
    paths: { coreDir: '/tmp/wordpress', testsDir },
    credentials: CREDENTIALS,
    osFamily: 'other',
    publicDir
  });

  assert.equal(await fs.readFile(path.join(publicDir, 'wp-tests-config.php'), 'utf8'), RENDERED_CONFIG);
}

async function testMissingConfigIsFatal() {
  const dir = await createTestDir('config-missing');
  const testsDir = path.join(dir, 'empty-tests-lib');
  const generator = new ConfigGenerator(new TempWorkspace(path.join(dir, 'tmp')), new RecordingLogger());

  const result = await generator.generate({
    paths: { coreDir: '/tmp/wordpress', testsDir },
    credentials: CREDENTIALS,
    osFamily: 'other'
  });

  assert.deepEqual(result, {
    status: 'fatal',
    message: `${path.join(testsDir, 'wp-tests-config.php')} does not exist.`
  });
}
