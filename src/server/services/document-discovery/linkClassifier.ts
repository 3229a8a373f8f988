/**
 * Link classification
 *
 * Decides whether an href on a listing page references a document, and
 * if so builds its DocumentRef according to the site's link policy.
 */

import type { DirectLinkPolicy, IndirectLinkPolicy, LinkPolicy } from '../../config/scraperConfig.js';
import type { DocumentRef } from '../infrastructure/types.js';

// Identifiers are put back into a query string unencoded
const IDENTIFIER_PATTERN = /^[A-Za-z0-9._~-]+$/;

/**
 * Resolve an href against the page it was found on.
 * Returns null for unparsable or non-http(s) targets (mailto:, javascript:, ...).
 * The fragment is dropped.
 */
export function toAbsoluteUrl(href: string, baseUrl: string): string | null {
    let resolved: URL;
    try {
        resolved = new URL(href.trim(), baseUrl);
    } catch {
        return null;
    }
    if (resolved.protocol !== 'http:' && resolved.protocol !== 'https:') {
        return null;
    }
    resolved.hash = '';
    return resolved.toString();
}

function normalizeTitle(text: string | undefined): string | undefined {
    const title = text?.replace(/\s+/g, ' ').trim();
    return title ? title : undefined;
}

function classifyDirect(href: string, text: string | undefined, pageUrl: string, policy: DirectLinkPolicy): DocumentRef | null {
    const url = toAbsoluteUrl(href, pageUrl);
    if (!url) return null;

    const pathname = new URL(url).pathname.toLowerCase();
    if (!pathname.endsWith(policy.extension.toLowerCase())) {
        return null;
    }

    const title = normalizeTitle(text);
    return title ? { id: url, url, title } : { id: url, url };
}

/**
 * Build the canonical download URL for an identifier
 */
export function buildDownloadUrl(policy: IndirectLinkPolicy, identifier: string): string {
    const url = new URL(policy.downloadEndpoint);
    url.search = '';
    url.searchParams.set(policy.idParam, identifier);
    return url.toString();
}

function classifyIndirect(href: string, text: string | undefined, pageUrl: string, policy: IndirectLinkPolicy): DocumentRef | null {
    if (!href.includes(policy.endpointMarker)) {
        return null;
    }

    let identifier: string | null;
    try {
        identifier = new URL(href.trim(), pageUrl).searchParams.get(policy.idParam);
    } catch {
        return null;
    }

    identifier = identifier?.trim() ?? null;
    if (!identifier || !IDENTIFIER_PATTERN.test(identifier)) {
        return null;
    }

    const title = normalizeTitle(text);
    const url = buildDownloadUrl(policy, identifier);
    return title ? { id: identifier, url, title } : { id: identifier, url };
}

/**
 * Classify a single hyperlink. Returns null when the link is not a document
 * reference, or when it is an endpoint link with a missing or malformed identifier.
 */
export function classifyLink(
    href: string,
    text: string | undefined,
    pageUrl: string,
    policy: LinkPolicy
): DocumentRef | null {
    switch (policy.kind) {
        case 'direct':
            return classifyDirect(href, text, pageUrl, policy);
        case 'indirect':
            return classifyIndirect(href, text, pageUrl, policy);
    }
}

/**
 * Remove duplicate references by id, keeping the first occurrence
 */
export function deduplicateDocuments(documents: readonly DocumentRef[]): DocumentRef[] {
    const seen = new Set<string>();
    return documents.filter((doc) => {
        if (seen.has(doc.id)) {
            return false;
        }
        seen.add(doc.id);
        return true;
    });
}
