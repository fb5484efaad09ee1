export * from "./types/brands";
export * from "./core/errors";
export * from "./core/types";
export * from "./core/store";
export * from "./core/headers";
export * from "./core/registry";
export * from "./core/gate";
export * from "./core/skip";
export * from "./core/step";
export * from "./core/router";
export * from "./core/hash";
export * from "./core/lightClient";
export * from "./core/runtime";
export * from "./codec/payload";
export * from "./codec/rlp";
export * from "./infra/decodeInbox";
export * from "./infra/memoryGateway";
export * from "./infra/fileStore";
export * from "./infra/tendermint";
export * from "./infra/relayer";
export * from "./config";
export * from "./setup";
export * from "./logging";
