/**
 * Per-workspace toolbar metadata: display name, ordering, enablement and icon.
 *
 * Kept apart from the definitions so editing how a workspace looks on the
 * toolbar never rewrites its captured window layout.
 */

import {
  asArray,
  asBoolean,
  asOptionalNumber,
  asString,
  asTrimmedString,
  equalsIgnoreCase,
  isRecord,
} from '../json-values';
import { readTextIfExists, withWriteLock, writeFileAtomic } from './file-guard';
import { WORKSPACE_PROVIDER_ID } from './storage-paths';
import type {
  ProviderIcon,
  ProviderIconType,
  WorkspaceButtonConfig,
  WorkspaceButtonDocument,
  WorkspaceDefinition,
} from './types';

export const BUTTON_SCHEMA_VERSION = 1;
export const WORKSPACE_BUTTON_PREFIX = 'workspace::';
export const DEFAULT_WORKSPACE_ICON_ID = 'layout-grid';

const ICON_TYPES: ProviderIconType[] = ['glyph', 'image', 'catalog'];

export function workspaceButtonId(workspaceId: string): string {
  return `${WORKSPACE_BUTTON_PREFIX}${workspaceId}`;
}

/** `workspace::abc` → `abc`; empty for ids without the prefix. */
export function workspaceIdFromButtonId(buttonId: string): string {
  const value = String(buttonId || '');
  if (!value.toLowerCase().startsWith(WORKSPACE_BUTTON_PREFIX)) return '';
  return value.slice(WORKSPACE_BUTTON_PREFIX.length).trim();
}

export function defaultWorkspaceIcon(): ProviderIcon {
  return { type: 'catalog', path: '', glyph: '', catalogId: DEFAULT_WORKSPACE_ICON_ID };
}

function createEmptyDocument(): WorkspaceButtonDocument {
  return {
    schemaVersion: BUTTON_SCHEMA_VERSION,
    providerId: WORKSPACE_PROVIDER_ID,
    displayName: 'Workspaces',
    enabled: true,
    lastUpdated: '',
    buttons: [],
  };
}

function normalizeIcon(value: unknown): ProviderIcon | null {
  if (!isRecord(value)) return null;
  const type = ICON_TYPES.find((candidate) => candidate === value.type);
  if (!type) return null;
  return {
    type,
    path: asString(value.path),
    glyph: asString(value.glyph),
    catalogId: asString(value.catalogId),
  };
}

function normalizeButton(value: unknown): WorkspaceButtonConfig | null {
  if (!isRecord(value)) return null;
  const id = asTrimmedString(value.id);
  const workspaceId = asTrimmedString(value.workspaceId) || workspaceIdFromButtonId(id);
  if (!id && !workspaceId) return null;
  return {
    id: id || workspaceButtonId(workspaceId),
    workspaceId,
    name: asString(value.name),
    description: asString(value.description),
    enabled: asBoolean(value.enabled, true),
    sortOrder: asOptionalNumber(value.sortOrder),
    icon: normalizeIcon(value.icon),
  };
}

export function parseButtonDocument(raw: string): WorkspaceButtonDocument {
  const parsed: unknown = JSON.parse(raw);
  const defaults = createEmptyDocument();
  if (!isRecord(parsed)) return defaults;
  return {
    schemaVersion: asOptionalNumber(parsed.schemaVersion) ?? defaults.schemaVersion,
    providerId: asTrimmedString(parsed.providerId) || defaults.providerId,
    displayName: asTrimmedString(parsed.displayName) || defaults.displayName,
    enabled: asBoolean(parsed.enabled, true),
    lastUpdated: asString(parsed.lastUpdated),
    buttons: asArray(parsed.buttons)
      .map(normalizeButton)
      .filter((button): button is WorkspaceButtonConfig => button !== null),
  };
}

export function cloneButton(button: WorkspaceButtonConfig): WorkspaceButtonConfig {
  return { ...button, icon: button.icon ? { ...button.icon } : null };
}

export class WorkspaceButtonStore {
  constructor(
    readonly filePath: string,
    private readonly now: () => Date = () => new Date()
  ) {}

  async loadConfig(): Promise<WorkspaceButtonDocument> {
    const raw = await readTextIfExists(this.filePath);
    if (raw === null || !raw.trim()) return createEmptyDocument();
    try {
      return parseButtonDocument(raw);
    } catch (e) {
      console.error('Failed to load workspace buttons:', this.filePath, e);
      return createEmptyDocument();
    }
  }

  async loadButtons(): Promise<WorkspaceButtonConfig[]> {
    const config = await this.loadConfig();
    return config.buttons.map(cloneButton);
  }

  async saveButtons(buttons: WorkspaceButtonConfig[]): Promise<void> {
    const copies = buttons.map(cloneButton);
    await this.update(() => [copies, undefined]);
  }

  /**
   * Makes sure the workspace has an enabled button. An existing button keeps
   * its customizations and only has blank fields filled in.
   */
  async ensureButton(workspace: WorkspaceDefinition): Promise<WorkspaceButtonConfig> {
    if (!workspace || !String(workspace.id || '').trim()) {
      throw new Error('Workspace id is required.');
    }
    const displayName = workspace.name.trim() || workspace.id;

    return this.update((buttons) => {
      const existing = buttons.find(
        (button) =>
          equalsIgnoreCase(button.workspaceId, workspace.id) ||
          equalsIgnoreCase(button.id, workspaceButtonId(workspace.id))
      );
      if (existing) {
        existing.enabled = true;
        existing.workspaceId = workspace.id;
        if (!existing.name.trim()) existing.name = displayName;
        if (!existing.description.trim()) existing.description = workspace.id;
        if (!existing.icon) existing.icon = defaultWorkspaceIcon();
        return [buttons, cloneButton(existing)];
      }

      const created: WorkspaceButtonConfig = {
        id: workspaceButtonId(workspace.id),
        workspaceId: workspace.id,
        name: displayName,
        description: workspace.id,
        enabled: true,
        sortOrder: null,
        icon: defaultWorkspaceIcon(),
      };
      return [[...buttons, created], cloneButton(created)];
    });
  }

  /** Returns false when the workspace had no button. */
  async removeWorkspaceButton(workspaceId: string): Promise<boolean> {
    const id = String(workspaceId || '').trim();
    if (!id) return false;
    return this.update((buttons) => {
      const rest = buttons.filter(
        (button) =>
          !equalsIgnoreCase(button.workspaceId, id) &&
          !equalsIgnoreCase(button.id, workspaceButtonId(id))
      );
      return [rest, rest.length !== buttons.length];
    });
  }

  /**
   * Read-modify-write under the lock. `change` returns the new button list
   * and a value to hand back to the caller.
   */
  private async update<T>(
    change: (buttons: WorkspaceButtonConfig[]) => [WorkspaceButtonConfig[], T]
  ): Promise<T> {
    return withWriteLock(this.filePath, async () => {
      const config = await this.loadConfig();
      const [buttons, result] = change(config.buttons.map(cloneButton));
      const next: WorkspaceButtonDocument = {
        ...config,
        lastUpdated: this.now().toISOString(),
        buttons,
      };
      await writeFileAtomic(this.filePath, JSON.stringify(next, null, 2));
      return result;
    });
  }
}
