/**
 * Gerrit REST Client
 *
 * Minimal read-only client for the Gerrit REST API over fetch.
 *
 * @module gerrit/rest-client
 */

import { Pr2GerritError } from "../domain/errors.ts";
import { loggers } from "../observability/index.ts";

/** Gerrit prefixes JSON bodies with this to defeat XSSI */
const MAGIC_PREFIX = /^\)\]\}'\s*/;

const DEFAULT_REQUEST_TIMEOUT_MS = 10_000;

export type FetchLike = typeof fetch;

/**
 * Non-2xx response from Gerrit
 */
export class GerritHttpError extends Pr2GerritError {
	readonly status: number;

	constructor(status: number, url: string, body: string) {
		super(`Gerrit API returned HTTP ${status}`, { context: { url, body: body.slice(0, 200) } });
		this.name = "GerritHttpError";
		this.status = status;
	}
}

export interface GerritRestClientOptions {
	/** Base URL ending in "/" */
	baseUrl: string;
	username?: string;
	password?: string;
	timeoutMs?: number;
	fetch?: FetchLike;
}

/**
 * Build the REST base URL for a host and optional path prefix
 */
export function gerritBaseUrl(host: string, basePath = ""): string {
	const path = basePath.replace(/^\/+|\/+$/g, "");
	return path ? `https://${host}/${path}/` : `https://${host}/`;
}

/**
 * Strip the magic prefix and parse JSON
 */
export function parseGerritJson(text: string): unknown {
	const jsonText = text.replace(MAGIC_PREFIX, "");
	try {
		return JSON.parse(jsonText);
	} catch (error) {
		throw new Pr2GerritError(`Failed to parse Gerrit response: ${jsonText.slice(0, 200)}`, { cause: error });
	}
}

export class GerritRestClient {
	readonly baseUrl: string;
	private readonly authorization?: string;
	private readonly timeoutMs: number;
	private readonly fetchImpl: FetchLike;

	constructor(options: GerritRestClientOptions) {
		this.baseUrl = options.baseUrl.endsWith("/") ? options.baseUrl : `${options.baseUrl}/`;
		if (options.username && options.password) {
			const encoded = Buffer.from(`${options.username}:${options.password}`).toString("base64");
			this.authorization = `Basic ${encoded}`;
		}
		this.timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
		this.fetchImpl = options.fetch ?? fetch;
	}

	get authenticated(): boolean {
		return this.authorization !== undefined;
	}

	/**
	 * Absolute URL for an API path such as "/changes/?q=..."
	 */
	urlFor(path: string): string {
		return `${this.baseUrl}${path.replace(/^\/+/, "")}`;
	}

	/**
	 * GET a path and return the parsed JSON body
	 */
	async get(path: string): Promise<unknown> {
		const url = this.urlFor(path);
		const controller = new AbortController();
		const timer = setTimeout(() => controller.abort(), this.timeoutMs);

		try {
			const headers: Record<string, string> = { Accept: "application/json" };
			if (this.authorization) {
				headers.Authorization = this.authorization;
			}
			loggers.gerrit.debug({ url }, "Gerrit REST GET");
			const response = await this.fetchImpl(url, { method: "GET", headers, signal: controller.signal });
			const text = await response.text();
			if (!response.ok) {
				throw new GerritHttpError(response.status, url, text);
			}
			return parseGerritJson(text);
		} finally {
			clearTimeout(timer);
		}
	}
}
