/**
 * Fixed placement and instance defaults.
 *
 * Everything is created in a single zone of a single region so that cleanup
 * only ever scans one region, and so instances share uniform latency.
 */

export const AWS_REGION = "us-east-1";
export const AWS_AVAILABILITY_ZONE = "us-east-1c";

export const SUPPORTED_OS = ["ubuntu-20.04", "ubuntu-22.04"] as const;

export const DEFAULT_VOLUME_SIZE_GB = 8;
export const DEFAULT_NETWORK_INTERFACE_COUNT = 1;

/** Login user baked into the Canonical Ubuntu images */
export const SSH_LOGIN_USER = "ubuntu";
export const SSH_PORT = 22;
/** sshd ClientAliveInterval written by the boot script (seconds) */
export const SSH_CLIENT_ALIVE_INTERVAL_SECONDS = 30;

/** App tag used by the CLI when none is given */
export const DEFAULT_CLI_APP_TAG = "create-instance";
