import { authenticateCallback } from './gate';
import { applySkip } from './skip';
import { applyStep } from './step';
import type { KvReader, KvWriter } from './store';
import type { CallbackKind, CallbackMessage, TrustedHeader } from './types';

export type CallbackHandler = (kv: KvWriter, msg: CallbackMessage) => TrustedHeader;
export type CallbackRoutes = Readonly<Record<CallbackKind, CallbackHandler>>;
export type CallbackGuard = (kv: KvReader, msg: CallbackMessage) => void;

export const DEFAULT_ROUTES: CallbackRoutes = {
  fulfillSkip: applySkip,
  fulfillStep: applyStep,
};

/**
 * Inbound dispatch keyed by callback kind. The guard runs before any handler
 * sees the message, so an unauthenticated callback never reaches decoding.
 */
export function routeCallback(
  kv: KvWriter,
  msg: CallbackMessage,
  routes: CallbackRoutes = DEFAULT_ROUTES,
  guard: CallbackGuard = authenticateCallback,
): TrustedHeader {
  guard(kv, msg);
  return routes[msg.kind](kv, msg);
}
