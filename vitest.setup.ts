import { beforeEach, afterEach, vi } from 'vitest';

const passthroughError = console.error.bind(console);
const passthroughWarn = console.warn.bind(console);

const SUPPRESSED_PREFIXES = [
  'Failed to load workspace definitions:',
  'Failed to load workspace buttons:',
  'Failed to save settings:',
  'Failed to reload workspace cache:',
  'Failed to create provider:',
  'Failed to register provider:',
  'Failed to discover actions:',
  'Failed to parse provider arguments:',
  'Failed to launch application:',
  'Failed to notify subscriber:',
  'Failed to run debounced',
  '[Toast]',
  '[ProviderRuntime]',
  '[Workspaces]',
  '[SystemControls]',
  '[ActionExecutor]',
  'Failed to load toolbar groups:',
  'Failed to refresh toolbar group:',
  'Failed to run toolbar action:',
  'Failed to load toolbar config:',
];

function isSuppressed(args: unknown[]): boolean {
  const first = String(args[0] ?? '');
  return SUPPRESSED_PREFIXES.some((prefix) => first.startsWith(prefix));
}

beforeEach(() => {
  vi.spyOn(console, 'error').mockImplementation((...args: unknown[]) => {
    if (isSuppressed(args)) return;
    passthroughError(...args);
  });
  vi.spyOn(console, 'warn').mockImplementation((...args: unknown[]) => {
    if (isSuppressed(args)) return;
    passthroughWarn(...args);
  });
});

afterEach(() => {
  vi.restoreAllMocks();
});
