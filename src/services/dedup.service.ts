/**
 * URL deduplication helpers for building the worklist
 */
import { createHash } from 'crypto';

const TRACKING_PARAMS = ['utm_source', 'utm_medium', 'utm_campaign', 'utm_content', 'utm_term', 'ref', 'source'];

/**
 * Canonicalize URL for consistent deduplication
 */
export function canonicalizeUrl(url: string): string {
    try {
        const parsed = new URL(url);
        // Remove tracking parameters
        TRACKING_PARAMS.forEach(param => parsed.searchParams.delete(param));
        // Remove trailing slash
        const path = parsed.pathname.replace(/\/+$/, '') || '/';
        // Lowercase hostname
        return `${parsed.protocol}//${parsed.hostname.toLowerCase()}${parsed.port ? `:${parsed.port}` : ''}${path}${parsed.search}`;
    } catch {
        // If URL parsing fails, hash it
        return createHash('sha256').update(url).digest('hex').substring(0, 32);
    }
}

/**
 * Source id for an ad hoc URL: `adhoc:<canonical url>`
 * Scheme and port stay part of the id, so distinct URLs never share one.
 */
export function syntheticSourceId(url: string): string {
    return `adhoc:${canonicalizeUrl(url)}`;
}
