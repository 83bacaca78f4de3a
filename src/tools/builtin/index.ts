import type { ToolRegistry } from '../registry.js';
import { registerArchitectTools } from './architect.js';
import { registerProductOwnerTools } from './product-owner.js';

export * from './architect.js';
export * from './product-owner.js';

/**
 * Register the architect and product owner handlers under their preset agent names
 */
export function registerBuiltinTools(registry: ToolRegistry): void {
  registerArchitectTools(registry);
  registerProductOwnerTools(registry);
}
