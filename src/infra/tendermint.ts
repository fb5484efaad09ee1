import { safeParse } from "valibot";
import { HeaderSyncError } from "../core/errors";
import type { TrustedHeader } from "../core/types";
import { makeLogger } from "../logging";
import type { Logger } from "../logging";
import { asHeaderHash, asHeight } from "../types/brands";
import type { Height } from "../types/brands";
import { commitResponseSchema } from "../schema";

/** Read side of the tracked chain, as seen by the relayer. */
export interface HeaderSource {
  getLatestHeight(): Promise<Height>;
  getHeader(height: Height): Promise<TrustedHeader>;
}

export type Fetcher = (url: string) => Promise<{
  ok: boolean;
  status: number;
  json(): Promise<unknown>;
}>;

export interface TendermintSourceOptions {
  rpcUrl: string;
  fetcher?: Fetcher;
  logger?: Logger;
}

/** Tendermint RPC `/commit`: the block id hash of a committed height is its header hash. */
export class TendermintHeaderSource implements HeaderSource {
  private readonly rpcUrl: string;
  private readonly fetcher: Fetcher;
  private readonly log: Logger;

  constructor(opts: TendermintSourceOptions) {
    this.rpcUrl = opts.rpcUrl.replace(/\/+$/, "");
    this.fetcher = opts.fetcher ?? ((url) => fetch(url));
    this.log = (opts.logger ?? makeLogger("silent")).child({ module: "tendermint" });
  }

  async getLatestHeight(): Promise<Height> {
    return (await this.commit()).height;
  }

  async getHeader(height: Height): Promise<TrustedHeader> {
    const header = await this.commit(height);
    if (header.height !== height) {
      throw new HeaderSyncError(
        "InvalidSourceResponse",
        `asked for height ${height}, source answered ${header.height}`,
      );
    }
    return header;
  }

  private async commit(height?: Height): Promise<TrustedHeader> {
    const url =
      height === undefined
        ? `${this.rpcUrl}/commit`
        : `${this.rpcUrl}/commit?height=${height.toString()}`;
    this.log.debug({ url }, "querying");

    const res = await this.fetcher(url).catch((err: unknown) => {
      throw new HeaderSyncError("SourceUnavailable", `${url}: ${String(err)}`);
    });
    if (!res.ok) {
      throw new HeaderSyncError("SourceUnavailable", `${url} answered ${res.status}`);
    }
    const parsed = safeParse(commitResponseSchema, await res.json());
    if (!parsed.success) {
      throw new HeaderSyncError(
        "InvalidSourceResponse",
        parsed.issues.map((issue) => issue.message).join("; "),
      );
    }
    const { header, commit } = parsed.output.result.signed_header;
    return {
      height: asHeight(header.height),
      header: asHeaderHash(commit.block_id.hash),
    };
  }
}
