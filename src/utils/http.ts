/**
 * Shared HTTP request helper
 * Used for both authenticated page requests and image downloads
 */

import { ProtocolError, TransportError } from "./errors";

/**
 * fetch-compatible function; the global fetch shares one connection pool
 */
export type Transport = (url: string, init?: RequestInit) => Promise<Response>;

/**
 * Send a GET request and return the response once its status is 200
 * Non-200 bodies are released before the error is thrown
 */
export async function sendRequest(
  transport: Transport,
  url: string,
  headers: Record<string, string> = {},
): Promise<Response> {
  let response: Response;

  try {
    response = await transport(url, { method: "GET", headers });
  } catch (error) {
    throw new TransportError("Cannot send request", url, { cause: error });
  }

  if (response.status !== 200) {
    await releaseBody(response);
    throw new ProtocolError(url, response.status);
  }

  return response;
}

/**
 * Read the whole body as text
 */
export async function readText(response: Response, url: string): Promise<string> {
  try {
    return await response.text();
  } catch (error) {
    throw new TransportError("Cannot read response", url, { cause: error });
  }
}

/**
 * Read the whole body as bytes
 */
export async function readBytes(
  response: Response,
  url: string,
): Promise<Uint8Array> {
  try {
    return new Uint8Array(await response.arrayBuffer());
  } catch (error) {
    throw new TransportError("Cannot read response", url, { cause: error });
  }
}

async function releaseBody(response: Response): Promise<void> {
  if (!response.body || response.bodyUsed) return;
  await response.body.cancel();
}
