import { createSocket, Socket as UdpSocketHandle, RemoteInfo } from "dgram";
import { EventEmitter } from "events";

export interface DatagramSocketEvents {
  message: (datagram: Buffer) => void;
  error: (err: Error) => void;
  close: () => void;
}

/**
 * The slice of a datagram socket a session needs.
 *
 * Each send() must reach the peer as one atomic datagram.
 */
export interface DatagramSocket {
  send(datagram: Buffer): void;
  close(): void;
  on<E extends keyof DatagramSocketEvents>(
    event: E,
    listener: DatagramSocketEvents[E]
  ): unknown;
}

export type UdpSocketOptions = {
  port?: number; // Local port, 0 or omitted for an ephemeral one
  host?: string;
  remotePort?: number; // Peer to send to; required for send()
  remoteHost?: string;
};

/**
 * UdpSocket adapts a dgram socket to DatagramSocket.
 *
 * When a remote peer is configured, datagrams from other senders are dropped.
 */
export class UdpSocket extends EventEmitter implements DatagramSocket {
  private socket: UdpSocketHandle;
  private readonly options: UdpSocketOptions;
  private pendingSends: number = 0;
  private closeRequested: boolean = false;

  constructor(socket: UdpSocketHandle, options: UdpSocketOptions) {
    super();
    this.socket = socket;
    this.options = options;
    this.wireSocket();
  }

  /**
   * Bind socket events to adapter events
   */
  private wireSocket(): void {
    this.socket.on("message", (msg: Buffer, rinfo: RemoteInfo) => {
      if (this.isFromPeer(rinfo)) {
        this.emit("message", msg);
      }
    });

    this.socket.on("error", (err) => {
      this.emit("error", err);
    });

    this.socket.on("close", () => {
      this.emit("close");
    });
  }

  private isFromPeer(rinfo: RemoteInfo): boolean {
    const { remotePort, remoteHost } = this.options;
    if (remotePort === undefined) return true;
    if (rinfo.port !== remotePort) return false;
    return remoteHost === undefined || rinfo.address === remoteHost;
  }

  send(datagram: Buffer): void {
    const { remotePort, remoteHost } = this.options;
    if (remotePort === undefined) {
      throw new Error("No remote peer configured");
    }

    this.pendingSends++;
    this.socket.send(datagram, remotePort, remoteHost ?? "127.0.0.1", (err) => {
      this.pendingSends--;
      if (err) this.emit("error", err);
      if (this.closeRequested && this.pendingSends === 0) this.socket.close();
    });
  }

  /**
   * Close once every queued send has been handed to the OS
   */
  close(): void {
    if (this.closeRequested) return;
    this.closeRequested = true;
    if (this.pendingSends === 0) this.socket.close();
  }

  /**
   * Local address once bound
   */
  address(): { address: string; port: number } {
    const { address, port } = this.socket.address();
    return { address, port };
  }
}

/**
 * Bind a UDP socket
 */
export function createUdpSocket(options: UdpSocketOptions = {}): Promise<UdpSocket> {
  return new Promise((resolve, reject) => {
    const socket = createSocket("udp4");

    const onError = (err: Error) => {
      socket.close();
      reject(err);
    };

    socket.once("error", onError);
    socket.bind(options.port ?? 0, options.host, () => {
      socket.off("error", onError);
      resolve(new UdpSocket(socket, options));
    });
  });
}
