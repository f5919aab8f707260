export const QUIT_MESSAGE = 'Stopping script...';
export const CONNECTION_MESSAGE = "Make sure you're connected to the internet.";
export const FINISHED_MESSAGE = 'Finished setting up packages';

export const REQUIRED_TOOLS = ['wget', 'curl', 'svn', 'rsync', 'composer', 'git'] as const;

export const APT_PACKAGES = ['wget', 'subversion', 'curl', 'git', 'rsync'];
export const BREW_PACKAGES = ['wget', 'svn'];

export const HOMEBREW_INSTALL_URL = 'https://raw.githubusercontent.com/Homebrew/install/master/install.sh';
export const COMPOSER_INSTALLER_URL = 'https://getcomposer.org/installer';
export const COMPOSER_PATH_EXPORT = 'export PATH="$PATH:$HOME/.composer/vendor/bin"';

/**
 * PHPUnit major versions keyed by the first three characters of PHP_VERSION.
 * Anything not listed gets DEFAULT_RUNNER_VERSION.
 */
export const RUNNER_VERSION_TABLE: Readonly<Record<string, string>> = {
  '7.1': '6',
  '7.0': '6',
  '5.6': '4'
};

export const DEFAULT_RUNNER_VERSION = '7';

export const RUNNER_DOWNLOAD_BASE = 'https://phar.phpunit.de';
export const VERSION_CHECK_URL = 'http://api.wordpress.org/core/version-check/1.7/';
export const SVN_BASE = 'https://develop.svn.wordpress.org';
export const RELEASE_ARCHIVE_BASE = 'https://wordpress.org';
export const NIGHTLY_ARCHIVE_URL = 'https://wordpress.org/nightly-builds/wordpress-latest.zip';

export const TEST_LIBRARY_PATHS = [
  { remote: 'tests/phpunit/includes/', local: 'includes' },
  { remote: 'tests/phpunit/data/', local: 'data' },
  { remote: 'wp-tests-config-sample.php', local: 'wp-tests-config.php' }
] as const;

export const CONFIG_FILE_NAME = 'wp-tests-config.php';
export const CONFIG_SAMPLE_FILE_NAME = 'wp-tests-config-sample.php';

export const CONFIG_PLACEHOLDERS = {
  abspath: "dirname( __FILE__ ) . '/src/'",
  dbName: 'youremptytestdbnamehere',
  dbUser: 'yourusernamehere',
  dbPassword: 'yourpasswordhere'
} as const;

export const CORE_DIR_VARIABLE = 'WP_CORE_DIR';
export const TESTS_DIR_VARIABLE = 'WP_TESTS_DIR';
