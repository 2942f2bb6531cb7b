import { createHash } from 'crypto';

function normalizeToken(value: string | null | undefined): string {
    if (!value) return '';
    return value.trim().toLowerCase().replace(/\s+/g, ' ');
}

/**
 * Lowercases and drops query string, fragment and trailing slashes.
 * Inputs that do not parse as URLs are only lowercased and trimmed.
 */
export function normalizeUrl(url: string | null | undefined): string {
    const raw = normalizeToken(url);
    if (!raw) return '';

    try {
        const parsed = new URL(raw);
        parsed.hash = '';
        parsed.search = '';
        const normalizedPath = parsed.pathname.replace(/\/+$/, '');
        const port = parsed.port ? `:${parsed.port}` : '';
        return `${parsed.protocol}//${parsed.hostname}${port}${normalizedPath}`;
    } catch {
        return raw.replace(/[?#].*$/, '').replace(/\/+$/, '');
    }
}

export function normalizeTitle(title: string | null | undefined): string {
    return normalizeToken(title);
}

/** SHA-256 hex of "<normalized url>||<normalized title>". */
export function buildPostingFingerprint(candidate: { url: string; title: string }): string {
    return createHash('sha256')
        .update(`${normalizeUrl(candidate.url)}||${normalizeTitle(candidate.title)}`)
        .digest('hex');
}
