/**
 * Tracks which live window belongs to which workspace application.
 * One window per application and one application per window.
 */

interface Binding {
  workspaceId: string;
  appId: string;
  handle: string;
}

export class ManagedWindowRegistry {
  private readonly byApp = new Map<string, Binding>();
  private readonly byWindow = new Map<string, Binding>();

  /**
   * Binds `handle` to the application. Returns false when the window is
   * already bound to a different application.
   */
  tryBind(workspaceId: string, appId: string, handle: string): boolean {
    if (!appId || !handle) return false;
    const owner = this.byWindow.get(handle);
    if (owner && owner.appId !== appId) return false;

    this.unbindApp(appId);
    const binding: Binding = { workspaceId, appId, handle };
    this.byApp.set(appId, binding);
    this.byWindow.set(handle, binding);
    return true;
  }

  getBoundWindow(appId: string): string | null {
    return this.byApp.get(appId)?.handle ?? null;
  }

  getBoundAppId(handle: string): string | null {
    return this.byWindow.get(handle)?.appId ?? null;
  }

  getWorkspaceIdForApp(appId: string): string | null {
    return this.byApp.get(appId)?.workspaceId ?? null;
  }

  isBound(handle: string): boolean {
    return this.byWindow.has(handle);
  }

  boundWindows(): Set<string> {
    return new Set(this.byWindow.keys());
  }

  unbindApp(appId: string): void {
    const binding = this.byApp.get(appId);
    if (!binding) return;
    this.byApp.delete(appId);
    this.byWindow.delete(binding.handle);
  }

  unbindWindow(handle: string): void {
    const binding = this.byWindow.get(handle);
    if (!binding) return;
    this.byWindow.delete(handle);
    this.byApp.delete(binding.appId);
  }

  unbindWorkspace(workspaceId: string): number {
    let removed = 0;
    for (const binding of Array.from(this.byApp.values())) {
      if (binding.workspaceId.toLowerCase() !== workspaceId.toLowerCase()) continue;
      this.unbindApp(binding.appId);
      removed++;
    }
    return removed;
  }

  get size(): number {
    return this.byApp.size;
  }
}
