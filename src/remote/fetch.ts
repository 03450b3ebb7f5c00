/** What a remote fetch was for; used to phrase the error. */
export type RemoteResource = "manifest" | "dockerfile" | "context";

export type FetchFn = typeof fetch;

const RESOURCE_LABEL: Record<RemoteResource, string> = {
  manifest: "manifest",
  dockerfile: "Dockerfile",
  context: "build context",
};

async function get(url: string, resource: RemoteResource, fetchFn: FetchFn): Promise<Response> {
  let res: Response;
  try {
    res = await fetchFn(url);
  } catch (err) {
    throw new RemoteFetchError(resource, url, err instanceof Error ? err.message : String(err));
  }
  if (!res.ok) {
    throw new RemoteFetchError(resource, url, `HTTP ${res.status} ${res.statusText}`.trim());
  }
  return res;
}

/** GET `url` and return the body as text. Non-2xx responses and network failures are fatal. */
export async function fetchText(url: string, resource: RemoteResource, fetchFn: FetchFn = fetch): Promise<string> {
  const res = await get(url, resource, fetchFn);
  return res.text();
}

/** GET `url` and return the raw body bytes. */
export async function fetchBytes(url: string, resource: RemoteResource, fetchFn: FetchFn = fetch): Promise<Buffer> {
  const res = await get(url, resource, fetchFn);
  return Buffer.from(await res.arrayBuffer());
}

export class RemoteFetchError extends Error {
  readonly resource: RemoteResource;
  readonly url: string;

  constructor(resource: RemoteResource, url: string, reason: string) {
    super(`Failed to fetch ${RESOURCE_LABEL[resource]} from ${url}: ${reason}`);
    this.name = "RemoteFetchError";
    this.resource = resource;
    this.url = url;
  }
}
