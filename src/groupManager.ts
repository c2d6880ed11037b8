import type { Client, PeerDirectory } from "./client";
import { Group } from "./group";
import { getDefaultLogger } from "./logger";
import { GROUP_SIZE, type Logger } from "./types";

export interface GroupManagerOptions {
  groupSize?: number;
  logger?: Logger;
}

/**
 * Places clients into fixed-size groups, first fit in creation order, and
 * answers peer lookups for them. Assignment runs synchronously, so
 * concurrent callers can't interleave inside it.
 */
export class GroupManager implements PeerDirectory {
  readonly groupSize: number;
  private groupList: Group[] = [];
  private groupsById = new Map<string, Group>();
  private clientsById = new Map<string, Client>();
  private logger: Logger;

  constructor({
    groupSize = GROUP_SIZE,
    logger = getDefaultLogger(),
  }: GroupManagerOptions = {}) {
    if (!Number.isInteger(groupSize) || groupSize < 1) {
      throw new RangeError(
        `Group size must be a positive integer, got ${groupSize}`
      );
    }
    this.groupSize = groupSize;
    this.logger = logger;
  }

  get groups(): readonly Group[] {
    return this.groupList;
  }

  assign(client: Client): Group {
    if (client.groupId !== undefined) {
      throw new Error(
        `Client ${client.id} already belongs to ${client.groupId}`
      );
    }
    if (this.clientsById.has(client.id)) {
      throw new Error(`Client ${client.id} is already assigned`);
    }

    let group = this.groupList.find((candidate) => candidate.hasRoom());
    if (!group) {
      group = new Group(`Group-${this.groupList.length + 1}`, this.groupSize);
      this.groupList.push(group);
      this.groupsById.set(group.id, group);
      this.logger.debug(`Created ${group.id}`, { label: "GroupManager" });
    }

    client.joinGroup(group.id, this);
    group.add(client);
    this.clientsById.set(client.id, client);

    this.logger.debug(`Assigned client ${client.id} to ${group.id}`, {
      label: "GroupManager",
      members: group.size,
    });
    return group;
  }

  getGroup(id: string): Group | undefined {
    return this.groupsById.get(id);
  }

  getClient(id: string): Client | undefined {
    return this.clientsById.get(id);
  }

  /** All assigned clients in assignment order. */
  clients(): Client[] {
    return [...this.clientsById.values()];
  }

  membersOf(groupId: string): readonly Client[] {
    return this.groupsById.get(groupId)?.members ?? [];
  }
}
