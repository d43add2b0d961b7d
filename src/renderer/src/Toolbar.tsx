import React from 'react';
import type { ToolbarBridge } from '../../main/toolbar-bridge';
import ToolbarGroupView from './components/ToolbarGroupView';
import { useToolbarGroups } from './hooks/useToolbarGroups';
import { visibleGroups } from './toolbar-groups';

interface ToolbarProps {
  bridge: ToolbarBridge;
}

const Toolbar: React.FC<ToolbarProps> = ({ bridge }) => {
  const { groups, buttonStates, execute } = useToolbarGroups(bridge);

  return (
    <div className="flex items-center gap-3 rounded-2xl bg-black/70 px-3 py-1.5 backdrop-blur">
      {visibleGroups(groups).map((group) => (
        <ToolbarGroupView
          key={`${group.providerId}:${group.id}`}
          group={group}
          buttonStates={buttonStates}
          onExecute={execute}
        />
      ))}
    </div>
  );
};

export default Toolbar;
