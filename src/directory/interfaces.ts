export type ChannelType = "open" | "private" | "direct" | "group";

export type Team = {
  id: string;
  displayName: string;
};

export type Channel = {
  id: string;
  displayName: string;
  type: ChannelType;
};

export type DirectoryUser = {
  id: string;
  email: string;
};

/**
 * Read-only view of the host's organisation data. Every method rejects on
 * failure; callers decide whether that is fatal.
 */
export interface DirectoryService {
  teamsForUser(userId: string): Promise<Team[]>;
  channelsForTeamAndUser(teamId: string, userId: string, includeDeleted: boolean): Promise<Channel[]>;
  getUser(userId: string): Promise<DirectoryUser | null>;
}

export function isGroupOrDirect(channel: Channel): boolean {
  return channel.type === "direct" || channel.type === "group";
}
