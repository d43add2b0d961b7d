import type { ProviderChangeKind, ProviderChangedEvent } from './types';

export function providerChanged(
  providerId: string,
  kind: ProviderChangeKind,
  affectedIds: string[] = []
): ProviderChangedEvent {
  return { providerId, kind, affectedIds: [...affectedIds] };
}

export function actionsUpdated(providerId: string, affectedIds: string[]): ProviderChangedEvent {
  return providerChanged(providerId, 'actions-updated', affectedIds);
}

export function groupUpdated(providerId: string, groupId: string): ProviderChangedEvent {
  return providerChanged(providerId, 'group-updated', [groupId]);
}

export function providerRegistered(providerId: string): ProviderChangedEvent {
  return providerChanged(providerId, 'provider-registered');
}
