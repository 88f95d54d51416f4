import { widgetIdFromPath } from "../core/paths.js";

/**
 * The active widget list shown by the site. Primary ids come from the
 * `widgets/` tree; every extension resolution replaces the extension part.
 */
export class WidgetList {
  private primary = new Set<string>();
  private loaded = new Set<string>();
  private failed = new Set<string>();

  loadPrimary(virtualPaths: Iterable<string>): void {
    this.primary = new Set([...virtualPaths].map((virtualPath) => widgetIdFromPath(virtualPath)));
  }

  applyExtensionResolution(loaded: Iterable<string>, failed: Iterable<string>): void {
    this.loaded = new Set(loaded);
    this.failed = new Set(failed);
  }

  has(widgetId: string): boolean {
    const id = widgetId.toLowerCase();
    return (this.primary.has(id) || this.loaded.has(id)) && !this.failed.has(id);
  }

  list(): string[] {
    return [...new Set([...this.primary, ...this.loaded])].filter((id) => !this.failed.has(id)).sort();
  }
}
