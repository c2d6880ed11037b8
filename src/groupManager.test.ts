import { describe, expect, jest, test } from "@jest/globals";
import { CacheStore } from "./cacheStore";
import { Client } from "./client";
import { Group } from "./group";
import { GroupManager } from "./groupManager";
import { GROUP_SIZE } from "./types";

const logger = {
  debug: jest.fn(),
  info: jest.fn(),
  warn: jest.fn(),
  error: jest.fn(),
};

// Clients here never resolve, so their caches never touch the disk
function createClient(id: string): Client {
  return new Client({
    id,
    upstreamEndpoint: "192.0.2.53",
    cache: new CacheStore({ clientId: id, cacheDir: "unused", logger }),
    upstream: { resolve: jest.fn(() => Promise.resolve("192.0.2.1")) },
    logger,
  });
}

function createClients(count: number): Client[] {
  return Array.from({ length: count }, (_, index) =>
    createClient(`client-${index}`)
  );
}

describe("GroupManager", () => {
  test("fills groups of 15 in creation order", () => {
    const manager = new GroupManager({ logger });
    const clients = createClients(GROUP_SIZE * 2 + 3);

    clients.forEach((client) => manager.assign(client));

    expect(manager.groups.map((group) => group.id)).toEqual([
      "Group-1",
      "Group-2",
      "Group-3",
    ]);
    expect(manager.groups.map((group) => group.size)).toEqual([15, 15, 3]);
    expect(manager.groups[0]?.members[0]).toBe(clients[0]);
    expect(manager.groups[1]?.members[0]).toBe(clients[15]);
    expect(manager.groups[2]?.members).toEqual(clients.slice(30));
  });

  test("puts every client in exactly one group", () => {
    const manager = new GroupManager({ logger });
    const clients = createClients(40);
    clients.forEach((client) => manager.assign(client));

    const members = manager.groups.flatMap((group) => [...group.members]);
    expect(members).toHaveLength(40);
    expect(new Set(members).size).toBe(40);
    for (const client of clients) {
      const group = manager.groups.find((candidate) =>
        candidate.members.includes(client)
      );
      expect(client.groupId).toBe(group?.id);
    }
  });

  test("returns the group it assigned and resolves members by group id", () => {
    const manager = new GroupManager({ groupSize: 2, logger });
    const [a, b, c] = createClients(3);

    expect(manager.assign(a).id).toBe("Group-1");
    expect(manager.assign(b).id).toBe("Group-1");
    expect(manager.assign(c).id).toBe("Group-2");

    expect(manager.membersOf("Group-1")).toEqual([a, b]);
    expect(manager.membersOf("Group-2")).toEqual([c]);
    expect(manager.membersOf("Group-9")).toEqual([]);
    expect(manager.getGroup("Group-2")?.members).toEqual([c]);
    expect(manager.getClient("client-1")).toBe(b);
    expect(manager.getClient("nobody")).toBeUndefined();
    expect(manager.clients()).toEqual([a, b, c]);
  });

  test("rejects a client assigned twice or a duplicate id", () => {
    const manager = new GroupManager({ logger });
    const client = createClient("alpha");
    manager.assign(client);

    expect(() => manager.assign(client)).toThrow(
      "Client alpha already belongs to Group-1"
    );
    expect(() => manager.assign(createClient("alpha"))).toThrow(
      "Client alpha is already assigned"
    );
    expect(manager.groups[0]?.size).toBe(1);
  });

  test("rejects a group size below one", () => {
    expect(() => new GroupManager({ groupSize: 0, logger })).toThrow(
      RangeError
    );
    expect(() => new GroupManager({ groupSize: 1.5, logger })).toThrow(
      RangeError
    );
  });

  test("handles concurrent assignment without overfilling a group", async () => {
    const manager = new GroupManager({ groupSize: 4, logger });
    const clients = createClients(10);

    await Promise.all(
      clients.map((client) =>
        Promise.resolve().then(() => manager.assign(client))
      )
    );

    expect(manager.groups.map((group) => group.size)).toEqual([4, 4, 2]);
  });
});

describe("Group", () => {
  test("refuses members beyond its capacity", () => {
    const group = new Group("Group-1", 2);
    const [a, b, c] = createClients(3);
    group.add(a);
    group.add(b);

    expect(group.hasRoom()).toBe(false);
    expect(() => group.add(c)).toThrow("Group-1 is full (2 members)");
    expect(group.members).toEqual([a, b]);
  });

  test("defaults to the standard group size", () => {
    expect(new Group("Group-1").capacity).toBe(GROUP_SIZE);
  });
});
