/**
 * src/sources/seedFile.ts
 *
 * Reads a JSON list of sources to register. Each entry is either explicit
 *
 *   { "id": "acme", "name": "Acme", "adapterKind": "ats-json", "config": { "vendor": "greenhouse", "slug": "acme" } }
 *
 * or just a careers URL, which is run through detectSource():
 *
 *   { "url": "https://jobs.lever.co/acme", "name": "Acme" }
 *
 * The file may hold the bare array or `{ "sources": [...] }`.
 */

import * as fs from 'fs';
import { z } from 'zod';
import { detectSource } from './detect.js';
import { InvalidSourceConfigError } from './errors.js';
import { parseSourceConfig } from './sourceConfig.js';
import { ADAPTER_KINDS, type NewSource } from './types.js';

const SourceId = z.string().regex(/^[a-z0-9][a-z0-9._-]*$/, 'lowercase letters, digits, ".", "_" or "-"');

const ExplicitEntrySchema = z.object({
    id: SourceId,
    name: z.string().min(1),
    adapterKind: z.enum(ADAPTER_KINDS),
    config: z.record(z.unknown()),
}).strict();

const UrlEntrySchema = z.object({
    id: SourceId.optional(),
    name: z.string().min(1).optional(),
    url: z.string().url(),
}).strict();

const EntrySchema = z.union([ExplicitEntrySchema, UrlEntrySchema]);

const SeedFileSchema = z.union([
    z.array(EntrySchema),
    z.object({ sources: z.array(EntrySchema) }).transform((f) => f.sources),
]);

export function slugifySourceId(name: string): string {
    return name
        .toLowerCase()
        .normalize('NFKD')
        .replace(/[\u0300-\u036f]/g, '')
        .replace(/[^a-z0-9]+/g, '-')
        .replace(/^-+|-+$/g, '');
}

/** Validates seed entries and resolves URL entries into full sources. */
export function parseSeedEntries(raw: unknown): NewSource[] {
    const parsed = SeedFileSchema.safeParse(raw);
    if (!parsed.success) {
        throw new InvalidSourceConfigError(
            'Invalid seed file',
            parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
        );
    }

    const seen = new Set<string>();
    const sources: NewSource[] = [];
    for (const entry of parsed.data) {
        let source: NewSource;
        if ('adapterKind' in entry) {
            parseSourceConfig(entry.adapterKind, entry.config);
            source = { ...entry };
        } else {
            const detected = detectSource(entry.url);
            const name = entry.name ?? detected.suggestedName;
            source = {
                id: entry.id ?? slugifySourceId(name),
                name,
                adapterKind: detected.adapterKind,
                config: detected.config,
            };
        }
        if (!source.id) {
            throw new InvalidSourceConfigError(`Cannot derive a source id for "${source.name}"`);
        }
        if (seen.has(source.id)) {
            throw new InvalidSourceConfigError(`Duplicate source id "${source.id}" in seed file`);
        }
        seen.add(source.id);
        sources.push(source);
    }
    return sources;
}

export function loadSeedFile(file: string): NewSource[] {
    let raw: unknown;
    try {
        raw = JSON.parse(fs.readFileSync(file, 'utf-8'));
    } catch (err) {
        throw new InvalidSourceConfigError(`Could not read seed file ${file}: ${err instanceof Error ? err.message : String(err)}`);
    }
    return parseSeedEntries(raw);
}
