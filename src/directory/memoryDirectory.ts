import type { Channel, DirectoryService, DirectoryUser, Team } from "./interfaces";

export type MemoryChannel = Channel & {
  teamId: string;
  memberIds: string[];
  deleted?: boolean;
};

export type MemoryDirectorySeed = {
  users?: DirectoryUser[];
  teams?: Array<Team & { memberIds: string[] }>;
  channels?: MemoryChannel[];
};

export type DirectoryCall =
  | { method: "teamsForUser"; userId: string }
  | { method: "channelsForTeamAndUser"; teamId: string; userId: string; includeDeleted: boolean }
  | { method: "getUser"; userId: string };

export class MemoryDirectory implements DirectoryService {
  readonly calls: DirectoryCall[] = [];
  private users: DirectoryUser[];
  private teams: Array<Team & { memberIds: string[] }>;
  private channels: MemoryChannel[];
  private failures = new Map<string, Error>();

  constructor(seed: MemoryDirectorySeed = {}) {
    this.users = [...(seed.users ?? [])];
    this.teams = [...(seed.teams ?? [])];
    this.channels = [...(seed.channels ?? [])];
  }

  /** Makes the next matching lookup reject. Keys: `teams`, `channels:<teamId>`, `user`. */
  failOn(key: string, error: Error): void {
    this.failures.set(key, error);
  }

  async teamsForUser(userId: string): Promise<Team[]> {
    this.calls.push({ method: "teamsForUser", userId });
    this.throwIfFailing("teams");
    return this.teams
      .filter((team) => team.memberIds.includes(userId))
      .map((team) => ({ id: team.id, displayName: team.displayName }));
  }

  async channelsForTeamAndUser(teamId: string, userId: string, includeDeleted: boolean): Promise<Channel[]> {
    this.calls.push({ method: "channelsForTeamAndUser", teamId, userId, includeDeleted });
    this.throwIfFailing(`channels:${teamId}`);
    return this.channels
      .filter((channel) => channel.teamId === teamId || channel.teamId === "")
      .filter((channel) => channel.memberIds.includes(userId))
      .filter((channel) => includeDeleted || !channel.deleted)
      .map((channel) => ({ id: channel.id, displayName: channel.displayName, type: channel.type }));
  }

  async getUser(userId: string): Promise<DirectoryUser | null> {
    this.calls.push({ method: "getUser", userId });
    this.throwIfFailing("user");
    return this.users.find((user) => user.id === userId) ?? null;
  }

  private throwIfFailing(key: string): void {
    const failure = this.failures.get(key);
    if (!failure) return;
    this.failures.delete(key);
    throw failure;
  }
}
