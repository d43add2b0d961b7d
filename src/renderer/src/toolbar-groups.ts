/**
 * Pure helpers that keep the renderer's group list in step with provider
 * change notifications.
 */

import type { ButtonGroup, ProviderChangedEvent } from '../../main/actions/types';

export type GroupRefreshPlan =
  | { type: 'provider'; providerId: string }
  | { type: 'all' };

/**
 * Decides how much of the toolbar an event invalidates. Most events touch
 * one provider's group; `reset` and `bulk-refresh` rebuild everything.
 */
export function planGroupRefresh(event: ProviderChangedEvent): GroupRefreshPlan {
  switch (event.kind) {
    case 'reset':
    case 'bulk-refresh':
      return { type: 'all' };
    case 'actions-added':
    case 'actions-removed':
    case 'actions-updated':
    case 'group-updated':
    case 'provider-registered':
      return event.providerId ? { type: 'provider', providerId: event.providerId } : { type: 'all' };
  }
}

function sameProvider(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

/**
 * Replaces the group owned by `group.providerId`, or inserts it, keeping
 * groups ordered as in `providerOrder`.
 */
export function applyGroupUpdate(
  groups: ButtonGroup[],
  group: ButtonGroup,
  providerOrder: string[]
): ButtonGroup[] {
  const next = groups.filter((existing) => !sameProvider(existing.providerId, group.providerId));
  next.push(group);
  return sortByProviderOrder(next, providerOrder);
}

function sortByProviderOrder(groups: ButtonGroup[], providerOrder: string[]): ButtonGroup[] {
  const rank = (providerId: string) => {
    const index = providerOrder.findIndex((id) => sameProvider(id, providerId));
    return index < 0 ? Number.MAX_SAFE_INTEGER : index;
  };
  return groups.sort((a, b) => rank(a.providerId) - rank(b.providerId));
}

export function removeGroup(groups: ButtonGroup[], providerId: string): ButtonGroup[] {
  return groups.filter((group) => !sameProvider(group.providerId, providerId));
}

/** Groups worth drawing: enabled and with at least one button. */
export function visibleGroups(groups: ButtonGroup[]): ButtonGroup[] {
  return groups.filter((group) => group.isEnabled && group.buttons.length > 0);
}

/** Drops groups whose provider is no longer registered. */
export function retainProviders(groups: ButtonGroup[], providerIds: string[]): ButtonGroup[] {
  return groups.filter((group) => providerIds.some((id) => sameProvider(id, group.providerId)));
}

// ─── Request ordering ───────────────────────────────────────────────

/**
 * Hands out increasing tickets per provider. Only the response to the most
 * recent request for a provider may touch its group.
 */
export class RequestTracker {
  private readonly latest = new Map<string, number>();
  private counter = 0;

  begin(providerId: string): number {
    const ticket = ++this.counter;
    this.latest.set(providerId.toLowerCase(), ticket);
    return ticket;
  }

  isLatest(providerId: string, ticket: number): boolean {
    return this.latest.get(providerId.toLowerCase()) === ticket;
  }
}

export interface GroupResponse {
  providerId: string;
  ticket: number;
  group: ButtonGroup | null;
}

/**
 * Applies createGroup responses, skipping any that a newer request for the
 * same provider has superseded.
 */
export function applyGroupResponses(
  groups: ButtonGroup[],
  responses: GroupResponse[],
  providerOrder: string[],
  tracker: RequestTracker
): ButtonGroup[] {
  let next = [...groups];
  for (const response of responses) {
    if (!tracker.isLatest(response.providerId, response.ticket)) continue;
    next = response.group
      ? applyGroupUpdate(next, response.group, providerOrder)
      : removeGroup(next, response.providerId);
  }
  return sortByProviderOrder(next, providerOrder);
}
