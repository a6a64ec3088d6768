/**
 * Default configuration values.
 * All values are overridable via config file, environment or CLI flags.
 */

export const DEFAULT_CONFIG_FILES = ['.plainstep.yaml', '.plainstep.yml', '.plainstep.json'] as const;

export interface EnvOverride {
  name: string;
  section: 'browser' | 'test';
  key: string;
  /** Environment values are strings; coerced to this before validation. */
  kind: 'string' | 'number' | 'boolean';
}

export const ENV_OVERRIDES: readonly EnvOverride[] = [
  { name: 'BASE_URL', section: 'test', key: 'base_url', kind: 'string' },
  { name: 'BROWSER_NAME', section: 'browser', key: 'name', kind: 'string' },
  { name: 'BROWSER_HEADLESS', section: 'browser', key: 'headless', kind: 'boolean' },
  { name: 'PAGE_LOAD_TIMEOUT', section: 'browser', key: 'page_load_timeout', kind: 'number' },
  { name: 'WAIT_TIMEOUT', section: 'test', key: 'wait_timeout', kind: 'number' },
  { name: 'SCREENSHOT_DIR', section: 'test', key: 'screenshot_dir', kind: 'string' },
  { name: 'REPORT_DIR', section: 'test', key: 'report_dir', kind: 'string' },
  { name: 'SETTLE_DELAY_MS', section: 'test', key: 'settle_delay_ms', kind: 'number' },
];
