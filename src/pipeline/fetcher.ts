import fs from "node:fs/promises";
import { FetchError, toIOError } from "../errors/index.js";
import type { Fetcher } from "./types.js";

export class HttpFetcher implements Fetcher {
  async fetch(url: string, destination: string): Promise<void> {
    let response: Response;
    try {
      response = await fetch(url, { redirect: "follow" });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new FetchError({
        url,
        status: null,
        message: `Failed to download ${url}: ${reason}`,
        cause: error,
      });
    }

    if (!response.ok) {
      throw new FetchError({
        url,
        status: response.status,
        message: `Failed to download ${url}: HTTP ${response.status}`,
      });
    }

    let data: Uint8Array;
    try {
      data = new Uint8Array(await response.arrayBuffer());
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new FetchError({
        url,
        status: response.status,
        message: `Failed to download ${url}: ${reason}`,
        cause: error,
      });
    }

    const partial = `${destination}.part`;
    try {
      await fs.writeFile(partial, data);
      await fs.rename(partial, destination);
    } catch (error) {
      await fs.rm(partial, { force: true });
      throw toIOError(error, destination, "prep");
    }
  }
}
