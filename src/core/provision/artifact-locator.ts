/**
 * Remote Artifact Locator
 * Resolves the download URL of the newest nightly build for a platform from
 * a bucket listing (GCS/S3 `ListBucketResult` XML)
 */

import xml2js from "xml2js";
import { getLogger } from "../../shared/pino-logger.js";
import { archiveExtension } from "./archive-extractor.js";
import { ArtifactNotFoundError, DownloadFailedError, toError } from "./errors.js";
import { remoteOsToken } from "./platform.js";
import type { LibraryIdentity, PlatformDescriptor, RemoteObject, RemoteObjectIndex } from "./types.js";

// Looked up on every call: initializeLogging may replace the root logger
function ensureLogger() {
  return getLogger("artifact-locator");
}

export type FetchFn = (url: string, init?: RequestInit) => Promise<Response>;

export const defaultFetch: FetchFn = (url, init) => fetch(url, init);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * First text value of an xml2js element (elements are arrays by default)
 */
function textOf(value: unknown): string | undefined {
  const first = Array.isArray(value) ? value[0] : value;
  if (typeof first === "string") {
    return first.trim();
  }
  if (isRecord(first)) {
    const text = first["_"];
    return typeof text === "string" ? text.trim() : undefined;
  }
  return undefined;
}

/**
 * Parse a bucket listing into a RemoteObjectIndex, in document order.
 * Objects without a key or with a non-integer generation are skipped.
 */
export async function parseBucketListing(xml: string, source = "listing"): Promise<RemoteObjectIndex> {
  let document: unknown;
  try {
    document = await xml2js.parseStringPromise(xml);
  } catch (error) {
    throw new DownloadFailedError(`Malformed bucket listing from ${source}`, source, {
      stage: "locate",
      cause: toError(error),
    });
  }

  if (!isRecord(document) || !("ListBucketResult" in document)) {
    throw new DownloadFailedError(`Bucket listing from ${source} has no ListBucketResult`, source, {
      stage: "locate",
    });
  }

  // an empty <ListBucketResult/> parses to "" rather than an object
  const root = document["ListBucketResult"];
  const contents = isRecord(root) ? root["Contents"] : undefined;
  const index: RemoteObjectIndex = [];
  if (!Array.isArray(contents)) {
    return index;
  }

  for (const item of contents) {
    if (!isRecord(item)) continue;
    const key = textOf(item["Key"]);
    const generation = textOf(item["Generation"]);
    if (!key || !generation || !/^\d+$/.test(generation)) continue;
    index.push({ key, generation: BigInt(generation) });
  }

  return index;
}

/**
 * Object with the greatest generation among keys ending in `suffix`.
 * Equal generations: the later-listed object wins.
 */
export function selectNewest(index: RemoteObjectIndex, suffix: string): RemoteObject | null {
  let newest: RemoteObject | null = null;
  for (const candidate of index) {
    if (!candidate.key.endsWith(suffix)) continue;
    if (!newest || candidate.generation >= newest.generation) {
      newest = candidate;
    }
  }
  return newest;
}

export class RemoteArtifactLocator {
  constructor(
    private readonly identity: LibraryIdentity,
    private readonly fetchImpl: FetchFn = defaultFetch,
  ) {}

  /**
   * e.g. `libtensorflow-cpu-darwin-x86_64.tar.gz`
   */
  expectedFileName(platform: PlatformDescriptor): string {
    return `${this.identity.archivePrefix}-${platform.accelerator}-${remoteOsToken(platform.os)}-${platform.arch}${archiveExtension(platform)}`;
  }

  async fetchIndex(): Promise<RemoteObjectIndex> {
    const url = this.identity.listingUrl;
    const fetchImpl = this.fetchImpl;

    let response: Response;
    try {
      response = await fetchImpl(url);
    } catch (error) {
      throw new DownloadFailedError(`Failed to fetch bucket listing ${url}`, url, {
        stage: "locate",
        cause: toError(error),
      });
    }

    if (!response.ok) {
      throw new DownloadFailedError(
        `Unexpected response code ${response.status} for ${url}`,
        url,
        { stage: "locate", status: response.status },
      );
    }

    let body: string;
    try {
      body = await response.text();
    } catch (error) {
      throw new DownloadFailedError(`Failed to read bucket listing ${url}`, url, {
        stage: "locate",
        cause: toError(error),
      });
    }

    const index = await parseBucketListing(body, url);
    ensureLogger().debug({ url, objects: index.length }, "Fetched bucket listing");
    return index;
  }

  /**
   * @returns `<listingUrl>/<key>` of the newest matching object
   * @throws ArtifactNotFoundError when nothing matches this platform
   */
  async locate(platform: PlatformDescriptor): Promise<string> {
    const fileName = this.expectedFileName(platform);
    ensureLogger().info({ fileName }, "Looking up newest prebuilt build");

    const index = await this.fetchIndex();
    const newest = selectNewest(index, fileName);
    if (!newest) {
      throw new ArtifactNotFoundError(fileName, this.identity.listingUrl);
    }

    const url = `${this.identity.listingUrl}/${newest.key}`;
    ensureLogger().info({ url, generation: newest.generation.toString() }, "Resolved prebuilt build");
    return url;
  }
}
