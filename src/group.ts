import type { Client } from "./client";
import { GROUP_SIZE } from "./types";

export class Group {
  readonly id: string;
  readonly capacity: number;
  private clients: Client[] = [];

  constructor(id: string, capacity = GROUP_SIZE) {
    this.id = id;
    this.capacity = capacity;
  }

  /** Members in the order they joined; this is the peer sweep order. */
  get members(): readonly Client[] {
    return this.clients;
  }

  get size(): number {
    return this.clients.length;
  }

  hasRoom(): boolean {
    return this.clients.length < this.capacity;
  }

  add(client: Client): void {
    if (!this.hasRoom()) {
      throw new RangeError(`${this.id} is full (${this.capacity} members)`);
    }
    this.clients.push(client);
  }
}
