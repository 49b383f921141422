/**
 * Every exit / status code the server can report, and why.
 *
 * Process-fatal codes terminate the server. Connection-fatal codes only end the
 * task handling one client, and are reported in its log line.
 */
export const ExitCode = {
  /** Clean shutdown. */
  OK: 0,
  /** The listening socket could not be created. */
  SOCKET_FAILED: 1,
  /** Address already in use, or not permitted. */
  BIND_FAILED: 2,
  /** Listening failed for any other reason. */
  LISTEN_FAILED: 3,
  /** Privileges could not be restricted after listening. */
  SANDBOX_FAILED: 4,
  /** A connection could not be handed off to its handler. */
  DISPATCH_FAILED: 5,
  /** A FROST_* environment variable was invalid. */
  INVALID_ENV: 6,
  /** Refusing to run as root. */
  DONT_USE_ROOT: 7,
  /** The web root could not be opened for scanning. */
  SCAN_OPEN_FAILED: 8,
  /** A directory or entry in the web root could not be read. */
  SCAN_READ_FAILED: 10,
  SYMLINK_IN_WEB_ROOT: 11,
  /** Device, socket, FIFO or anything else that isn't a file or directory. */
  UNUSUAL_FILE: 13,
  CYCLE_IN_WEB_ROOT: 14,
  FILE_OPEN_FAILED: 16,
  ALLOCATION_FAILED: 17,
  /** Read failed, or the file changed size between scan and read. */
  FILE_READ_FAILED: 18,
  /** More files than the route table was sized for. */
  ROUTE_TABLE_FULL: 19,
  SOCKET_READ_FAILED: 21,
  NON_GET_REQUEST: 22,
  /** The client sent too few (or too many) bytes. */
  WEIRD_RX_LENGTH: 23,
  WEIRD_REQUEST_PATH: 24,
  /** The configured not-found route is itself missing; a built-in body was sent. */
  NOTFOUND_ROUTE_MISSING: 25,
  SOCKET_SEND_FAILED: 26,
  /** The peer went away before the whole response was written. */
  WEIRD_TX_LENGTH: 27,
  CROSS_DEVICE_IN_WEB_ROOT: 28,
  DUPLICATE_ROUTE: 29,
  /** A connection handler threw something it did not classify. */
  HANDLER_FAILED: 30,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

const NAMES = new Map<number, string>(
  Object.entries(ExitCode).map(([name, code]) => [code, name]),
);

export const exitCodeName = (code: number): string => NAMES.get(code) ?? `UNKNOWN_${code}`;
