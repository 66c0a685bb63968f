/**
 * Byte stream to the telescope's TCP control port.
 */
export interface StreamConnection {
  write(data: string): Promise<void>;
  /** Idempotent; triggers the close handler once */
  close(): void;
  onData(handler: (chunk: Buffer | string) => void): void;
  onClose(handler: (reason: string) => void): void;
}

/**
 * Network access used by the protocol session. The Node implementation uses
 * dgram + net; tests provide an in-process telescope.
 */
export interface ISessionTransport {
  /**
   * Send the UDP introduction datagram and wait for any reply.
   * Rejects with HandshakeTimeoutError.
   */
  handshake(host: string, port: number, timeoutMs: number): Promise<void>;

  /**
   * Open the TCP control channel. Rejects with ConnectionRefusedError.
   */
  openStream(host: string, port: number, timeoutMs: number): Promise<StreamConnection>;
}
