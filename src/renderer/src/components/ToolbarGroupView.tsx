import React from 'react';
import { CircleSlash, LayoutGrid, Loader2, Pause, Play, Square, type LucideIcon } from 'lucide-react';
import type { ButtonState } from '../../../main/actions/action-executor';
import type { ActionIcon, ButtonGroup, ToolbarButton } from '../../../main/actions/types';

const CATALOG_ICONS: Record<string, LucideIcon> = {
  'layout-grid': LayoutGrid,
  play: Play,
  pause: Pause,
  'circle-slash': CircleSlash,
};

interface ToolbarGroupViewProps {
  group: ButtonGroup;
  buttonStates: Record<string, ButtonState>;
  onExecute: (button: ToolbarButton) => void;
}

function ButtonIcon({ icon, busy }: { icon: ActionIcon | null; busy: boolean }) {
  if (busy) return <Loader2 className="w-4 h-4 animate-spin" />;
  if (!icon) return <Square className="w-4 h-4" />;
  if (icon.type === 'image') return <img src={icon.value} alt="" className="w-4 h-4" />;
  if (icon.type === 'glyph') return <span className="w-4 h-4 text-sm leading-4">{icon.value}</span>;
  const Icon = CATALOG_ICONS[icon.value] ?? Square;
  return <Icon className="w-4 h-4" />;
}

const ToolbarGroupView: React.FC<ToolbarGroupViewProps> = ({ group, buttonStates, onExecute }) => {
  const inline = group.layout.maxInline > 0 ? group.buttons.slice(0, group.layout.maxInline) : group.buttons;
  const overflow = group.buttons.slice(inline.length);
  const compact = group.layout.style === 'icon';

  return (
    <div
      className={`flex items-center gap-1 ${group.layout.overflow === 'wrap' ? 'flex-wrap' : ''}`}
      title={group.description}
      data-group-id={group.id}
    >
      {inline.map((button) => {
        const state = buttonStates[button.id];
        const busy = state?.busy ?? false;
        return (
          <button
            key={button.id}
            type="button"
            disabled={!button.isEnabled || busy}
            title={state?.statusMessage || button.description}
            onClick={() => onExecute(button)}
            className={`flex items-center gap-1.5 rounded-full px-2 py-1 text-xs text-white/90 hover:bg-white/10 ${
              button.isDimmed ? 'opacity-50' : ''
            }`}
          >
            <ButtonIcon icon={button.icon} busy={busy} />
            {!compact && <span className="truncate max-w-[120px]">{button.name}</span>}
          </button>
        );
      })}
      {overflow.length > 0 && (
        <select
          className="bg-transparent text-xs text-white/70"
          value=""
          onChange={(e) => {
            const picked = overflow.find((button) => button.id === e.target.value);
            if (picked) onExecute(picked);
          }}
        >
          <option value="">{`+${overflow.length}`}</option>
          {overflow.map((button) => (
            <option key={button.id} value={button.id}>
              {button.name}
            </option>
          ))}
        </select>
      )}
    </div>
  );
};

export default ToolbarGroupView;
