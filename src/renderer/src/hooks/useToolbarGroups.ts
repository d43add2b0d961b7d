import { useCallback, useEffect, useRef, useState } from 'react';
import type { ButtonState } from '../../../main/actions/action-executor';
import type { ButtonGroup, ToolbarButton } from '../../../main/actions/types';
import type { ToolbarBridge } from '../../../main/toolbar-bridge';
import { RequestTracker, applyGroupResponses, planGroupRefresh, retainProviders } from '../toolbar-groups';

interface UseToolbarGroupsReturn {
  groups: ButtonGroup[];
  buttonStates: Record<string, ButtonState>;
  execute: (button: ToolbarButton) => void;
  reload: () => void;
}

export function useToolbarGroups(bridge: ToolbarBridge): UseToolbarGroupsReturn {
  const [groups, setGroups] = useState<ButtonGroup[]>([]);
  const [buttonStates, setButtonStates] = useState<Record<string, ButtonState>>({});
  const providerOrderRef = useRef<string[]>([]);
  const trackerRef = useRef(new RequestTracker());

  // Responses can arrive out of order; the tracker lets only the newest
  // request per provider through.
  const refreshProvider = useCallback(
    async (providerId: string) => {
      const tracker = trackerRef.current;
      const ticket = tracker.begin(providerId);
      const result = await bridge.createGroup(providerId);
      setGroups((current) =>
        applyGroupResponses(current, [{ providerId, ticket, group: result.group }], providerOrderRef.current, tracker)
      );
    },
    [bridge]
  );

  const refreshAll = useCallback(async () => {
    const tracker = trackerRef.current;
    const [ids, staticGroups] = await Promise.all([bridge.providerIds(), bridge.staticGroups()]);
    const order = [...staticGroups.map((group) => group.providerId), ...ids];
    providerOrderRef.current = order;
    const responses = await Promise.all(
      ids.map(async (providerId) => {
        const ticket = tracker.begin(providerId);
        const result = await bridge.createGroup(providerId);
        return { providerId, ticket, group: result.group };
      })
    );
    const configured = staticGroups.map((group) => ({
      providerId: group.providerId,
      ticket: tracker.begin(group.providerId),
      group,
    }));
    setGroups((current) =>
      applyGroupResponses(retainProviders(current, order), [...configured, ...responses], order, tracker)
    );
  }, [bridge]);

  const reload = useCallback(() => {
    refreshAll().catch((e: unknown) => console.error('Failed to load toolbar groups:', e));
  }, [refreshAll]);

  useEffect(() => {
    reload();
    const stopChanges = bridge.onProvidersChanged((event) => {
      const plan = planGroupRefresh(event);
      const work = plan.type === 'all' ? refreshAll() : refreshProvider(plan.providerId);
      work.catch((e: unknown) => console.error('Failed to refresh toolbar group:', e));
    });
    const stopStates = bridge.onButtonState((buttonId, state) => {
      setButtonStates((current) => ({ ...current, [buttonId]: state }));
    });
    return () => {
      stopChanges();
      stopStates();
    };
  }, [bridge, reload, refreshAll, refreshProvider]);

  const execute = useCallback(
    (button: ToolbarButton) => {
      bridge.execute(button).catch((e: unknown) => console.error('Failed to run toolbar action:', e));
    },
    [bridge]
  );

  return { groups, buttonStates, execute, reload };
}
