import { AiHtmlAdapter } from './aiHtml.js';
import { AtsJsonAdapter } from './atsJson.js';
import { GuestSearchAdapter } from './guestSearch.js';
import type { AdapterKind, SourceAdapter } from './types.js';

/** Closed set: one adapter per kind, selected by `source.adapterKind`. */
export type AdapterRegistry = Readonly<Record<AdapterKind, SourceAdapter>>;

export function createAdapterRegistry(overrides: Partial<Record<AdapterKind, SourceAdapter>> = {}): AdapterRegistry {
    return {
        'ats-json': overrides['ats-json'] ?? new AtsJsonAdapter(),
        'guest-search': overrides['guest-search'] ?? new GuestSearchAdapter(),
        'ai-assisted-html': overrides['ai-assisted-html'] ?? new AiHtmlAdapter(),
    };
}
