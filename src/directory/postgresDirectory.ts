import { z } from "zod";
import type { Queryable } from "../db/postgres";
import type { Channel, ChannelType, DirectoryService, DirectoryUser, Team } from "./interfaces";

const CHANNEL_TYPES: Record<string, ChannelType> = {
  O: "open",
  P: "private",
  D: "direct",
  G: "group",
};

const TeamRow = z.object({
  id: z.string(),
  display_name: z.string(),
});

const ChannelRow = z.object({
  id: z.string(),
  display_name: z.string(),
  type: z.string(),
});

const UserRow = z.object({
  id: z.string(),
  email: z.string(),
});

function toChannelType(raw: string): ChannelType {
  const type = CHANNEL_TYPES[raw.toUpperCase()];
  if (!type) {
    throw new Error(`unknown channel type "${raw}"`);
  }
  return type;
}

/**
 * Reads teams, channels and users straight from the host database.
 * Direct and group conversations have no team, so they come back with
 * every team's channel list; callers filter them out.
 */
export class PostgresDirectory implements DirectoryService {
  constructor(private readonly db: Queryable) {}

  async teamsForUser(userId: string): Promise<Team[]> {
    const result = await this.db.query(
      `
      SELECT t.id, t.display_name
      FROM teams t
      JOIN team_members tm ON tm.team_id = t.id
      WHERE tm.user_id = $1
        AND tm.delete_at = 0
        AND t.delete_at = 0
      ORDER BY t.display_name ASC, t.id ASC
      `,
      [userId]
    );
    return result.rows.map((row) => {
      const parsed = TeamRow.parse(row);
      return { id: parsed.id, displayName: parsed.display_name };
    });
  }

  async channelsForTeamAndUser(teamId: string, userId: string, includeDeleted: boolean): Promise<Channel[]> {
    const result = await this.db.query(
      `
      SELECT c.id, c.display_name, c.type
      FROM channels c
      JOIN channel_members cm ON cm.channel_id = c.id
      WHERE cm.user_id = $1
        AND (c.team_id = $2 OR c.team_id = '')
        AND ($3::boolean OR c.delete_at = 0)
      ORDER BY c.display_name ASC, c.id ASC
      `,
      [userId, teamId, includeDeleted]
    );
    return result.rows.map((row) => {
      const parsed = ChannelRow.parse(row);
      return { id: parsed.id, displayName: parsed.display_name, type: toChannelType(parsed.type) };
    });
  }

  async getUser(userId: string): Promise<DirectoryUser | null> {
    const result = await this.db.query("SELECT id, email FROM users WHERE id = $1 AND delete_at = 0 LIMIT 1", [userId]);
    const row = result.rows[0];
    if (row === undefined) return null;
    return UserRow.parse(row);
  }
}
