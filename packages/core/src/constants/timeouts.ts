/**
 * Polling intervals and deadlines for the provisioning window.
 */

/** Backoff between elastic IP association attempts */
export const ADDRESS_ASSOCIATION_INTERVAL_MS = 2_000;

/** Give up associating the elastic IP after this long (the instance is then unreachable) */
export const ADDRESS_ASSOCIATION_TIMEOUT_MS = 120_000;

/** Interval between describe calls while waiting for addresses; that poll has no deadline */
export const INSTANCE_READINESS_INTERVAL_MS = 1_000;

/** Interval between SSH reachability probes once addresses are assigned */
export const SSH_REACHABILITY_INTERVAL_MS = 1_000;

/** Per-probe ssh ConnectTimeout (seconds) */
export const SSH_CONNECT_TIMEOUT_SECONDS = 10;
