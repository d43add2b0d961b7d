/**
 * Static toolbar configuration
 *
 * What this file is
 * - The hand-edited `toolbar.json` document listing button groups that do not
 *   come from a provider: shortcuts to programs, scripts and provider actions.
 *
 * What it does
 * - Loads leniently: a missing file is seeded with the default "System"
 *   group, a malformed one is logged and treated as empty.
 * - Saves with the same temp-file-and-rename write and lock file as the
 *   workspace stores.
 * - Projects the document into ButtonGroups whose `providerId` is
 *   `config:<groupId>`, so the renderer can order them with provider groups.
 */

import * as path from 'path';
import type {
  ActionIcon,
  ButtonGroup,
  GroupLayout,
  GroupLayoutStyle,
  GroupOverflow,
  IconType,
  ToolbarAction,
  ToolbarButton,
} from './actions/types';
import { getUserDataDir } from './app-paths';
import { asArray, asBoolean, asFiniteNumber, asString, asTrimmedString, isRecord } from './json-values';
import { readTextIfExists, withWriteLock, writeFileAtomic } from './workspaces/file-guard';

export const STATIC_GROUP_PREFIX = 'config:';

export interface StaticGroupConfig {
  id: string;
  name: string;
  description: string;
  isEnabled: boolean;
  layout: GroupLayout;
  buttons: ToolbarButton[];
}

export interface ToolbarConfig {
  groups: StaticGroupConfig[];
}

const LAYOUT_STYLES: GroupLayoutStyle[] = ['capsule', 'icon', 'list'];
const OVERFLOW_MODES: GroupOverflow[] = ['menu', 'wrap'];
const ICON_TYPES: IconType[] = ['glyph', 'image', 'catalog'];

const DEFAULT_LAYOUT: GroupLayout = { style: 'capsule', overflow: 'menu', maxInline: 8 };

export function getToolbarConfigPath(): string {
  return path.join(getUserDataDir(), 'toolbar.json');
}

export function staticGroupProviderId(groupId: string): string {
  return `${STATIC_GROUP_PREFIX}${groupId}`;
}

export function isStaticGroupProviderId(providerId: string): boolean {
  return providerId.toLowerCase().startsWith(STATIC_GROUP_PREFIX);
}

export function createDefaultToolbarConfig(): ToolbarConfig {
  return {
    groups: [
      {
        id: 'system',
        name: 'System',
        description: '',
        isEnabled: true,
        layout: { style: 'icon', overflow: 'wrap', maxInline: 8 },
        buttons: [],
      },
    ],
  };
}

// ─── Normalization ──────────────────────────────────────────────────

function normalizeLayout(value: unknown): GroupLayout {
  if (!isRecord(value)) return { ...DEFAULT_LAYOUT };
  const maxInline = Math.round(asFiniteNumber(value.maxInline, DEFAULT_LAYOUT.maxInline));
  return {
    style: LAYOUT_STYLES.find((style) => style === value.style) ?? DEFAULT_LAYOUT.style,
    overflow: OVERFLOW_MODES.find((mode) => mode === value.overflow) ?? DEFAULT_LAYOUT.overflow,
    maxInline: maxInline >= 0 ? maxInline : DEFAULT_LAYOUT.maxInline,
  };
}

function normalizeIcon(value: unknown): ActionIcon | null {
  if (!isRecord(value)) return null;
  const type = ICON_TYPES.find((candidate) => candidate === value.type);
  const iconValue = asTrimmedString(value.value);
  return type && iconValue ? { type, value: iconValue } : null;
}

function normalizeAction(value: unknown): ToolbarAction | null {
  if (!isRecord(value)) return null;
  if (value.type === 'provider') {
    const providerId = asTrimmedString(value.providerId);
    const providerActionId = asTrimmedString(value.providerActionId);
    if (!providerId || !providerActionId) return null;
    const argumentsJson = asString(value.argumentsJson);
    return argumentsJson
      ? { type: 'provider', providerId, providerActionId, argumentsJson }
      : { type: 'provider', providerId, providerActionId };
  }
  const command = asTrimmedString(value.command);
  if (!command) return null;
  return {
    type: 'command-line',
    command,
    arguments: asString(value.arguments),
    workingDirectory: asString(value.workingDirectory),
  };
}

function normalizeButton(value: unknown, groupId: string, index: number): ToolbarButton | null {
  if (!isRecord(value)) return null;
  const action = normalizeAction(value.action);
  if (!action) return null;
  const name = asString(value.name);
  return {
    id: asTrimmedString(value.id) || `${groupId}-${index + 1}`,
    name,
    description: asString(value.description) || name,
    icon: normalizeIcon(value.icon),
    isEnabled: asBoolean(value.isEnabled, true),
    isDimmed: false,
    action,
  };
}

function normalizeGroup(value: unknown, index: number): StaticGroupConfig | null {
  if (!isRecord(value)) return null;
  const name = asString(value.name);
  const id = asTrimmedString(value.id) || `group-${index + 1}`;
  const buttons: ToolbarButton[] = [];
  for (const [buttonIndex, entry] of asArray(value.buttons).entries()) {
    const button = normalizeButton(entry, id, buttonIndex);
    if (button) buttons.push(button);
  }
  return {
    id,
    name: name || id,
    description: asString(value.description),
    isEnabled: asBoolean(value.isEnabled, true),
    layout: normalizeLayout(value.layout),
    buttons,
  };
}

export function parseToolbarConfig(raw: string): ToolbarConfig {
  const parsed: unknown = JSON.parse(raw);
  if (!isRecord(parsed)) return { groups: [] };
  const groups: StaticGroupConfig[] = [];
  for (const [index, entry] of asArray(parsed.groups).entries()) {
    const group = normalizeGroup(entry, index);
    if (group) groups.push(group);
  }
  return { groups };
}

function cloneGroup(group: StaticGroupConfig): StaticGroupConfig {
  return {
    ...group,
    layout: { ...group.layout },
    buttons: group.buttons.map((button) => ({
      ...button,
      icon: button.icon ? { ...button.icon } : null,
      action: { ...button.action },
    })),
  };
}

// ─── Store ──────────────────────────────────────────────────────────

export class ToolbarConfigStore {
  constructor(readonly filePath: string = getToolbarConfigPath()) {}

  async load(): Promise<ToolbarConfig> {
    const raw = await readTextIfExists(this.filePath);
    if (raw === null) {
      const seeded = createDefaultToolbarConfig();
      await this.save(seeded);
      return seeded;
    }
    if (!raw.trim()) return { groups: [] };
    try {
      return parseToolbarConfig(raw);
    } catch (e) {
      console.error('Failed to load toolbar config:', this.filePath, e);
      return { groups: [] };
    }
  }

  async save(config: ToolbarConfig): Promise<void> {
    const copy: ToolbarConfig = { groups: config.groups.map(cloneGroup) };
    await withWriteLock(this.filePath, () => writeFileAtomic(this.filePath, JSON.stringify(copy, null, 2)));
  }

  /** The configured groups as the toolbar draws them. */
  async loadGroups(): Promise<ButtonGroup[]> {
    const config = await this.load();
    return config.groups.map((group) => ({ ...cloneGroup(group), providerId: staticGroupProviderId(group.id) }));
  }
}
