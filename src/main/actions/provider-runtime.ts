/**
 * Provider Runtime
 *
 * What this file is:
 * - The registry every action provider is routed through.
 *
 * What it does:
 * - Registers providers by case-insensitive id (last registration wins).
 * - Detects optional capabilities (group building, change notification)
 *   structurally and forwards provider change events to runtime subscribers.
 * - Turns provider failures into data: discovery errors drop that provider's
 *   actions, invocation errors become `{ ok: false }` results. Only
 *   cancellation propagates.
 *
 * Constructed once by the host and passed to whoever needs it.
 */

import { ChangeChannel } from './change-channel';
import { isCancellation } from './cancellation';
import { providerRegistered } from './provider-events';
import {
  fail,
  isChangeNotifyingProvider,
  isGroupProvider,
  type ActionContext,
  type ActionDescriptor,
  type ActionProvider,
  type ActionResult,
  type CreateGroupResult,
  type ProgressSink,
  type ProviderChangedEvent,
  type ProviderChangedListener,
  type ProviderInfo,
  type Unsubscribe,
} from './types';

interface Registration {
  provider: ActionProvider;
  release: Unsubscribe | null;
}

function normalizeId(id: string): string {
  return String(id || '').trim().toLowerCase();
}

function errorMessage(error: unknown): string {
  if (error instanceof Error && error.message) return error.message;
  return String(error || 'Unknown error');
}

export class ProviderRuntime {
  private readonly registrations = new Map<string, Registration>();
  private readonly changes = new ChangeChannel<ProviderChangedEvent>();

  // ─── Registry ─────────────────────────────────────────────────────

  register(provider: ActionProvider): void {
    const key = normalizeId(provider.id);
    if (!key) throw new Error('Provider id is required.');

    const existing = this.registrations.get(key);
    if (existing) {
      console.warn(`[ProviderRuntime] Replacing provider "${existing.provider.id}" with "${provider.id}".`);
      existing.release?.();
      if (existing.provider !== provider) this.disposeProvider(existing.provider);
    }

    let release: Unsubscribe | null = null;
    if (isChangeNotifyingProvider(provider)) {
      release = provider.onProviderChanged((event) => {
        this.changes.emit({ ...event, providerId: event.providerId || provider.id });
      });
    }

    this.registrations.set(key, { provider, release });
    this.changes.emit(providerRegistered(provider.id));
  }

  /** Removes a provider and releases its change subscription. Returns false when unknown. */
  unregister(providerId: string): boolean {
    const key = normalizeId(providerId);
    const existing = this.registrations.get(key);
    if (!existing) return false;
    existing.release?.();
    this.registrations.delete(key);
    return true;
  }

  tryGet(providerId: string): ActionProvider | undefined {
    return this.registrations.get(normalizeId(providerId))?.provider;
  }

  providerIds(): string[] {
    return Array.from(this.registrations.values(), (entry) => entry.provider.id);
  }

  // ─── Discovery ────────────────────────────────────────────────────

  async getInfo(providerId: string, signal?: AbortSignal): Promise<ProviderInfo | null> {
    const provider = this.tryGet(providerId);
    if (!provider) return null;
    return provider.getInfo(signal);
  }

  /**
   * Collects one provider's descriptors. Stops early, without throwing, once
   * the signal aborts.
   */
  async discover(
    providerId: string,
    context: ActionContext,
    signal?: AbortSignal
  ): Promise<ActionDescriptor[]> {
    const provider = this.tryGet(providerId);
    if (!provider) return [];

    const results: ActionDescriptor[] = [];
    for await (const descriptor of provider.discover(context, signal)) {
      if (signal?.aborted) break;
      results.push(descriptor);
    }
    return results;
  }

  /**
   * Discovers every provider in parallel. A provider that throws is logged
   * and contributes nothing; results are ordered by provider then `order`.
   */
  async discoverAll(context: ActionContext, signal?: AbortSignal): Promise<ActionDescriptor[]> {
    const ids = this.providerIds();
    const perProvider = await Promise.all(
      ids.map(async (id) => {
        try {
          return await this.discover(id, context, signal);
        } catch (e) {
          if (isCancellation(e, signal)) throw e;
          console.error('Failed to discover actions:', id, e);
          return [];
        }
      })
    );
    signal?.throwIfAborted();

    return perProvider.flatMap((descriptors) =>
      [...descriptors].sort((a, b) => a.order - b.order)
    );
  }

  // ─── Groups & invocation ──────────────────────────────────────────

  async createGroup(
    providerId: string,
    context: ActionContext,
    signal?: AbortSignal
  ): Promise<CreateGroupResult> {
    const provider = this.tryGet(providerId);
    if (!provider) {
      return { group: null, error: `Provider "${providerId}" is not registered.` };
    }
    if (!isGroupProvider(provider)) {
      return { group: null, error: `Provider "${provider.id}" does not build groups.` };
    }

    try {
      const group = await provider.createGroup(context, signal);
      return { group: { ...group, providerId: provider.id }, error: null };
    } catch (e) {
      if (isCancellation(e, signal)) throw e;
      console.error(`[ProviderRuntime] createGroup failed for "${provider.id}":`, e);
      return { group: null, error: errorMessage(e) };
    }
  }

  async invoke(
    providerId: string,
    actionId: string,
    args: unknown,
    context: ActionContext,
    progress?: ProgressSink,
    signal?: AbortSignal
  ): Promise<ActionResult> {
    const provider = this.tryGet(providerId);
    if (!provider) return fail(`Provider "${providerId}" is not registered.`);

    try {
      return await provider.invoke(actionId, args, context, progress, signal);
    } catch (e) {
      if (isCancellation(e, signal)) throw e;
      console.error(`[ProviderRuntime] invoke failed for "${provider.id}/${actionId}":`, e);
      return fail(errorMessage(e));
    }
  }

  // ─── Notifications & lifetime ─────────────────────────────────────

  onProvidersChanged(listener: ProviderChangedListener): Unsubscribe {
    return this.changes.subscribe(listener);
  }

  dispose(): void {
    for (const { provider, release } of this.registrations.values()) {
      release?.();
      this.disposeProvider(provider);
    }
    this.registrations.clear();
    this.changes.clear();
  }

  private disposeProvider(provider: ActionProvider): void {
    try {
      provider.dispose?.();
    } catch (e) {
      console.error(`[ProviderRuntime] dispose failed for "${provider.id}":`, e);
    }
  }
}
