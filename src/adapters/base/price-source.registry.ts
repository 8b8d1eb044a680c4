import type { IPriceSourceAdapter } from "../../common/types/adapters";

/**
 * Ordered set of price sources. Registration order is the dispatch order.
 */
export class PriceSourceRegistry {
  private adapters = new Map<string, IPriceSourceAdapter>();

  /**
   * Register a new price source
   */
  register(adapter: IPriceSourceAdapter): void {
    const normalizedId = adapter.id.toLowerCase();

    if (this.adapters.has(normalizedId)) {
      throw new Error(`Adapter '${adapter.id}' is already registered`);
    }

    this.adapters.set(normalizedId, adapter);
  }

  /**
   * Enabled adapters in dispatch order
   */
  getActive(): IPriceSourceAdapter[] {
    return Array.from(this.adapters.values());
  }

  /**
   * Display name for an adapter id, falling back to the id itself
   */
  getDisplayName(id: string): string {
    return this.adapters.get(id.toLowerCase())?.displayName ?? id;
  }
}
