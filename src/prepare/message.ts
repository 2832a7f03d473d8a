/**
 * Commit message synthesis
 *
 * Pure transformations from PR commit messages to the message of the
 * squashed commit, and from a PR title and body to a commit message.
 *
 * @module prepare/message
 */

const CHANGE_ID_PREFIX = "Change-Id:";
const SIGNED_OFF_PREFIX = "Signed-off-by:";

/**
 * Parts of a squashed message before assembly
 */
export interface SquashMessageParts {
	/** Body lines with trailers and dependency metadata removed */
	bodyLines: string[];
	/** Change-Id values found in the source messages, in order */
	changeIds: string[];
	/** Unique Signed-off-by lines, sorted */
	signedOff: string[];
}

function opensMetadataSection(line: string): boolean {
	const trimmed = line.trim();
	return trimmed === "---" || trimmed === "```" || line.startsWith("updated-dependencies:");
}

/**
 * Split concatenated commit messages into body, Change-Ids and sign-offs.
 *
 * A line that is exactly "---" or "```", or that starts with
 * "updated-dependencies:", opens a metadata section (dependency bot
 * output). Lines inside the section are dropped until one that does not
 * start with two spaces, "-" or "dependency-"; that line is processed
 * normally.
 */
export function splitSquashMessage(messages: string): SquashMessageParts {
	const bodyLines: string[] = [];
	const changeIds: string[] = [];
	const signedOff = new Set<string>();
	let inMetadata = false;

	for (const line of messages.split(/\r?\n/)) {
		if (!line.trim()) continue;

		if (opensMetadataSection(line)) {
			inMetadata = true;
			continue;
		}
		if (inMetadata) {
			if (line.startsWith("- dependency-") || line.startsWith("  dependency-")) continue;
			if (!line.startsWith("  ") && !line.startsWith("-") && !line.startsWith("dependency-")) {
				inMetadata = false;
			}
		}

		if (line.startsWith(CHANGE_ID_PREFIX)) {
			const id = line.slice(CHANGE_ID_PREFIX.length).trim();
			if (id) changeIds.push(id);
			continue;
		}
		if (line.startsWith(SIGNED_OFF_PREFIX)) {
			signedOff.add(line);
			continue;
		}
		if (!inMetadata) {
			bodyLines.push(line);
		}
	}

	return { bodyLines, changeIds, signedOff: [...signedOff].sort() };
}

/**
 * Assemble the squashed commit message: body, sorted sign-offs, then the
 * reused Change-Id when there is one
 */
export function buildSquashCommitMessage(parts: SquashMessageParts, reusedChangeId?: string): string {
	let message = parts.bodyLines.join("\n").trim();
	if (parts.signedOff.length > 0) {
		message += `\n\n${parts.signedOff.join("\n")}`;
	}
	if (reusedChangeId) {
		message += `\n\n${CHANGE_ID_PREFIX} ${reusedChangeId}`;
	}
	return message;
}

/**
 * Squash message in one step
 */
export function composeSquashMessage(messages: string, reusedChangeId?: string): string {
	return buildSquashCommitMessage(splitSquashMessage(messages), reusedChangeId);
}

/**
 * Message built from a PR title and body, keeping the current commit's
 * Signed-off-by and Change-Id lines.
 *
 * `signoff` tells the caller whether git still needs to add a sign-off.
 */
export function composePrTitleMessage(
	title: string,
	body: string,
	currentMessage: string,
): { message: string; signoff: boolean } {
	const cleanTitle = title.trim();
	const cleanBody = body.trim();
	const currentLines = currentMessage.split(/\r?\n/);
	const signed = currentLines.filter((line) => line.startsWith(SIGNED_OFF_PREFIX));
	const changeIds = currentLines.filter((line) => line.startsWith(CHANGE_ID_PREFIX));

	if (!cleanTitle && !cleanBody) {
		return { message: currentMessage.trim(), signoff: signed.length === 0 };
	}

	const parts = cleanBody ? [cleanTitle, "", cleanBody] : [cleanTitle];
	const trailers = [...signed, ...changeIds];
	if (trailers.length > 0) {
		parts.push("", ...trailers);
	}
	return { message: parts.join("\n").trim(), signoff: signed.length === 0 };
}
