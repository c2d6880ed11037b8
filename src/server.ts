import dgram from "node:dgram";
import net, { type AddressInfo } from "node:net";
import * as dnsPacket from "dns-packet";
import { errorMessage } from "./errors";
import { getDefaultLogger } from "./logger";
import type { DnsAnswer, Logger } from "./types";

const FLAG_RECURSION_DESIRED = 0x0100;
const FLAG_RECURSION_AVAILABLE = 0x0080;
const RCODE_SERVFAIL = 2;

export interface DnsQuery {
  domain: string;
  sourceAddress: string;
}

/**
 * Resolves one question to an address and the seconds it stays fresh,
 * rejecting when it can't.
 */
export type QueryHandler = (query: DnsQuery) => Promise<DnsAnswer>;

export interface DnsProtocolServerOptions {
  logger?: Logger;
}

/**
 * UDP front end: decodes queries, answers A questions through the
 * registered handler, and reports handler failures as SERVFAIL.
 */
export class DnsProtocolServer {
  private socket: dgram.Socket | null = null;
  private handler: QueryHandler | null = null;
  private logger: Logger;

  constructor({ logger = getDefaultLogger() }: DnsProtocolServerOptions = {}) {
    this.logger = logger;
  }

  registerHandler(handler: QueryHandler): void {
    this.handler = handler;
  }

  /** Builds the reply for one datagram, or null when it should be dropped. */
  async handleMessage(
    message: Buffer,
    sourceAddress: string
  ): Promise<Buffer | null> {
    let query: dnsPacket.Packet;
    try {
      query = dnsPacket.decode(message);
    } catch (error) {
      this.logger.debug(
        `Dropping undecodable datagram from ${sourceAddress}`,
        { label: "DnsServer", error: errorMessage(error) }
      );
      return null;
    }

    if (query.type === "response") {
      return null;
    }

    const questions = query.questions ?? [];
    let answers: dnsPacket.Answer[] = [];
    let rcode = 0;

    for (const question of questions) {
      if (question.type !== "A") {
        continue;
      }

      this.logger.debug(`Looking up ${question.name}`, {
        label: "DnsServer",
        source: sourceAddress,
      });

      if (!this.handler) {
        rcode = RCODE_SERVFAIL;
        break;
      }

      try {
        const answer = await this.handler({
          domain: question.name,
          sourceAddress,
        });
        answers.push({
          type: "A",
          name: question.name,
          ttl: answer.ttlSeconds,
          data: answer.address,
        });
      } catch (error) {
        this.logger.debug(`Failed to resolve ${question.name}`, {
          label: "DnsServer",
          error: errorMessage(error),
        });
        rcode = RCODE_SERVFAIL;
      }
    }

    if (rcode !== 0) {
      answers = [];
    }

    return dnsPacket.encode({
      type: "response",
      id: query.id ?? 0,
      flags:
        FLAG_RECURSION_AVAILABLE |
        ((query.flags ?? 0) & FLAG_RECURSION_DESIRED) |
        rcode,
      questions,
      answers,
    });
  }

  listen(port: number, address = "0.0.0.0"): Promise<AddressInfo> {
    if (this.socket) {
      return Promise.reject(new Error("DNS server is already listening"));
    }

    return new Promise((resolve, reject) => {
      const socket = dgram.createSocket(net.isIPv6(address) ? "udp6" : "udp4");

      socket.on("message", (message, remote) => {
        this.reply(socket, message, remote);
      });
      socket.once("error", reject);

      socket.bind(port, address, () => {
        socket.off("error", reject);
        socket.on("error", (error) => {
          this.logger.error(`DNS server socket error: ${error.message}`, {
            label: "DnsServer",
          });
        });
        this.socket = socket;

        const bound = socket.address();
        this.logger.info(
          `DNS server listening on ${bound.address}:${bound.port}`,
          { label: "DnsServer" }
        );
        resolve(bound);
      });
    });
  }

  close(): Promise<void> {
    const socket = this.socket;
    if (!socket) {
      return Promise.resolve();
    }
    this.socket = null;
    return new Promise((resolve) => socket.close(() => resolve()));
  }

  private reply(
    socket: dgram.Socket,
    message: Buffer,
    remote: dgram.RemoteInfo
  ): void {
    this.handleMessage(message, remote.address)
      .then((response) => {
        if (!response) {
          return;
        }
        socket.send(response, remote.port, remote.address, (error) => {
          if (error) {
            this.logger.error(`Failed to send DNS response: ${error.message}`, {
              label: "DnsServer",
              remote: remote.address,
            });
          }
        });
      })
      .catch((error: unknown) => {
        this.logger.error(`Error handling DNS query: ${errorMessage(error)}`, {
          label: "DnsServer",
          remote: remote.address,
        });
      });
  }
}
