import { isGroupOrDirect, type Channel, type DirectoryService, type Team } from "../directory/interfaces";

/** Wire shape the autocomplete dropdown expects. */
export type AutocompleteListItem = {
  item: string;
  hint: string;
  help_text: string;
};

export type AggregationStage = "teams" | "channels";

export class DirectoryAggregationError extends Error {
  readonly stage: AggregationStage;
  readonly teamId: string | null;

  constructor(stage: AggregationStage, teamId: string | null, cause: unknown) {
    super(
      stage === "teams" ? "failed to get teams for user" : `failed to get channels for team ${teamId ?? ""} for user`,
      { cause }
    );
    this.name = "DirectoryAggregationError";
    this.stage = stage;
    this.teamId = teamId;
  }
}

export function toAutocompleteItem(team: Team, channel: Channel): AutocompleteListItem {
  return {
    item: channel.id,
    hint: `— ${channel.displayName}`,
    help_text: `Team: ${team.displayName}`,
  };
}

/**
 * Lists every active team channel the user can see, team by team in the
 * order the directory returns them. Queries run one at a time and the first
 * failure aborts the whole list.
 */
export async function buildChannelAutocomplete(
  directory: DirectoryService,
  userId: string
): Promise<AutocompleteListItem[]> {
  let teams: Team[];
  try {
    teams = await directory.teamsForUser(userId);
  } catch (error) {
    throw new DirectoryAggregationError("teams", null, error);
  }

  const items: AutocompleteListItem[] = [];
  for (const team of teams) {
    let channels: Channel[];
    try {
      channels = await directory.channelsForTeamAndUser(team.id, userId, false);
    } catch (error) {
      throw new DirectoryAggregationError("channels", team.id, error);
    }

    for (const channel of channels) {
      if (isGroupOrDirect(channel)) continue;
      items.push(toAutocompleteItem(team, channel));
    }
  }
  return items;
}
