/**
 * Optional start/close hooks for anything that holds a connection, a file
 * handle or a client. The bot starts resources in order and closes them in
 * reverse.
 */
export interface RuntimeResource {
  start?(): Promise<void>;
  close?(): Promise<void>;
}
