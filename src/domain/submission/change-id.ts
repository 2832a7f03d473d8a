import { loggers } from "../../observability/index.ts";

const CHANGE_ID_TOKEN = /^[A-Za-z0-9._-]+$/;

/** Matches a Change-Id mention inside free text such as PR comments */
export const CHANGE_ID_MENTION = /Change-Id:\s*([A-Za-z0-9._-]+)/g;

/**
 * Check whether a value is usable as a Change-Id correlation key.
 * The token is opaque: only its character set is checked.
 */
export function isValidChangeId(value: string): boolean {
	if (!value) return false;
	return CHANGE_ID_TOKEN.test(value);
}

/**
 * Trim and validate Change-Ids, dropping invalid ones with a warning
 */
export function validateChangeIds(ids: Iterable<string>): string[] {
	const out: string[] = [];
	for (const raw of ids) {
		const id = raw.trim();
		if (!id) continue;
		if (!isValidChangeId(id)) {
			loggers.pipeline.warn({ changeId: id }, "Ignoring invalid Change-Id");
			continue;
		}
		out.push(id);
	}
	return out;
}

/**
 * Deduplicate keeping the first occurrence of each value
 */
export function dedupePreservingOrder(values: Iterable<string>): string[] {
	const seen = new Set<string>();
	const out: string[] = [];
	for (const value of values) {
		if (seen.has(value)) continue;
		seen.add(value);
		out.push(value);
	}
	return out;
}

/**
 * Extract every Change-Id mentioned in a block of text, in order of appearance
 */
export function findChangeIdMentions(text: string): string[] {
	const found: string[] = [];
	for (const match of text.matchAll(CHANGE_ID_MENTION)) {
		const id = match[1]?.trim();
		if (id) found.push(id);
	}
	return found;
}
