import type { ProviderRuntime } from './provider-runtime';
import type { ActionProvider } from './types';

export interface ProviderFactory {
  id: string;
  create: () => ActionProvider;
}

/**
 * Builds and registers each builtin provider in turn. A provider that fails
 * to construct or register is logged and skipped; ids in `disabled`
 * (lower-case) are never constructed. Returns the ids that were registered.
 */
export function registerBuiltinProviders(
  runtime: ProviderRuntime,
  factories: ProviderFactory[],
  disabled: string[] = []
): string[] {
  const skip = new Set(disabled.map((id) => id.toLowerCase()));
  const registered: string[] = [];

  for (const factory of factories) {
    if (skip.has(factory.id.toLowerCase())) {
      console.log(`[ProviderRuntime] Provider "${factory.id}" is disabled in settings.`);
      continue;
    }

    let provider: ActionProvider;
    try {
      provider = factory.create();
    } catch (e) {
      console.error('Failed to create provider:', factory.id, e);
      continue;
    }

    try {
      runtime.register(provider);
      registered.push(provider.id);
    } catch (e) {
      console.error('Failed to register provider:', factory.id, e);
      provider.dispose?.();
    }
  }

  return registered;
}
