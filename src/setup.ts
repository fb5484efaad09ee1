import type { Config } from "./config";
import { LightClient } from "./core/lightClient";
import { MemoryKvStore } from "./core/store";
import type { KvStore } from "./core/store";
import type { EventSink, GatewayClient } from "./core/types";
import { FileKvStore } from "./infra/fileStore";
import { Relayer } from "./infra/relayer";
import { TendermintHeaderSource } from "./infra/tendermint";
import type { Fetcher, HeaderSource } from "./infra/tendermint";
import { makeLogger } from "./logging";
import type { Logger } from "./logging";

export interface SetupOptions {
  onEvent?: EventSink;
  fetcher?: Fetcher;
}

export interface Setup {
  client: LightClient;
  store: KvStore;
  logger: Logger;
  // present only when TENDERMINT_RPC_URL is configured
  source?: HeaderSource;
  relayer?: Relayer;
  relayerIntervalMs: number;
}

/**
 * Builds a LightClient from configuration. A configured gateway address is
 * written through the admin surface when the store does not already hold it.
 * With an RPC url, a Tendermint source and a relayer are built as well; the
 * caller starts it with `relayer.start(relayerIntervalMs)`.
 */
export const createLightClient = (
  config: Config,
  gateway: GatewayClient,
  opts: SetupOptions = {},
): Setup => {
  const logger = makeLogger(config.logLevel, config.logPretty);
  const store = config.stateFile ? new FileKvStore(config.stateFile) : new MemoryKvStore();
  const client = new LightClient({
    store,
    gateway,
    logger,
    maxSkipSpan: config.maxSkipSpan,
    adminPolicy: config.adminPolicy,
    genesisPolicy: config.genesisPolicy,
    onEvent: opts.onEvent,
  });

  if (config.gatewayAddress && client.gatewayAddress() !== config.gatewayAddress) {
    const operator = config.adminPolicy.kind === "restricted" ? config.adminPolicy.admin : undefined;
    client.setGatewayAddress(config.gatewayAddress, operator);
  }

  const source = config.tendermintRpcUrl
    ? new TendermintHeaderSource({ rpcUrl: config.tendermintRpcUrl, fetcher: opts.fetcher, logger })
    : undefined;
  const relayer = source
    ? new Relayer({ client, source, logger, confirmations: config.relayerConfirmations })
    : undefined;

  logger.info(
    {
      latest: client.latestHeight().toString(),
      stateFile: config.stateFile ?? null,
      rpc: config.tendermintRpcUrl ?? null,
    },
    "light client ready",
  );
  return { client, store, logger, source, relayer, relayerIntervalMs: config.relayerIntervalMs };
};
