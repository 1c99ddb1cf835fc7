import type http from "node:http";
import fs from "node:fs/promises";
import type { FileHandle } from "node:fs/promises";
import { pipeline } from "node:stream/promises";
import { errorMessage, type Logger } from "../config/logger";
import type { Authorizer } from "../authz/authorization";
import type { BundleProvider } from "../assets/bundle";
import { profileImagePath } from "../assets/bundle";
import type { DirectoryService } from "../directory/interfaces";
import type { ValidatedConfiguration } from "../settings/configuration";
import { buildChannelAutocomplete, DirectoryAggregationError, type AutocompleteListItem } from "../autocomplete/dynamicChannels";
import { RouteError, ok, type HandlerResult } from "./errors";
import { respondErr, respondJSON, serializeJson, withSecurityHeaders, writeBody } from "./respond";

export const ROUTE_API_SETTINGS = "/api/v1/settings";
export const ROUTE_PROFILE_IMAGE = "/profile.png";
export const ROUTE_DYNAMIC_CHANNELS = "/dynamic_channels";

export type RouteContext = {
  req: http.IncomingMessage;
  res: http.ServerResponse;
  method: string;
  userId: string;
  configuration: ValidatedConfiguration;
};

export type RouteHandler = (ctx: RouteContext) => Promise<HandlerResult>;

export type RouteDependencies = {
  logger: Logger;
  directory: DirectoryService;
  authorizer: Authorizer;
  bundle: BundleProvider;
};

const internalError = (cause: unknown, kind: "upstream_query_failed" | "internal_resource_failure") =>
  new RouteError(kind, "internal error", { cause });

export function createRouteTable(deps: RouteDependencies): ReadonlyMap<string, RouteHandler> {
  const { logger, directory, authorizer, bundle } = deps;

  const handleSettings: RouteHandler = async ({ res, method, userId, configuration }) => {
    if (method !== "GET") {
      return respondErr(res, new RouteError("method_not_allowed", `method ${method} is not allowed, must be GET`));
    }
    if (!userId) {
      return respondErr(res, new RouteError("unauthenticated", "not authorized"));
    }

    const enabled = configuration.enableWebUi && (await authorizer.isAuthorizedIdentity(userId, configuration));
    return respondJSON(res, { enable_web_ui: enabled });
  };

  const handleProfileImage: RouteHandler = async ({ res }) => {
    let root: string;
    try {
      root = await bundle.bundleRoot();
    } catch (error) {
      logger.error("bundle_path_unavailable", { message: errorMessage(error) });
      return respondErr(res, internalError(error, "internal_resource_failure"));
    }

    let image: FileHandle;
    try {
      image = await fs.open(profileImagePath(root), "r");
    } catch (error) {
      logger.error("profile_image_unreadable", { message: errorMessage(error) });
      return respondErr(res, internalError(error, "internal_resource_failure"));
    }

    try {
      res.writeHead(200, withSecurityHeaders({ "content-type": "image/png" }));
      await pipeline(image.createReadStream({ autoClose: false }), res);
    } catch (error) {
      logger.error("profile_image_copy_failed", { message: errorMessage(error) });
      return { status: 500, error: new RouteError("write_failure", "failed to write response", { cause: error }) };
    } finally {
      await image.close();
    }
    return ok();
  };

  const handleDynamicChannels: RouteHandler = async ({ res, userId }) => {
    let items: AutocompleteListItem[];
    try {
      items = await buildChannelAutocomplete(directory, userId);
    } catch (error) {
      const cause = error instanceof DirectoryAggregationError ? error.cause : error;
      logger.error(
        error instanceof DirectoryAggregationError && error.stage === "channels"
          ? "directory_channels_query_failed"
          : "directory_teams_query_failed",
        {
          userId,
          teamId: error instanceof DirectoryAggregationError ? error.teamId : null,
          message: errorMessage(cause),
        }
      );
      return respondErr(res, internalError(error, "upstream_query_failed"));
    }

    let body: string;
    try {
      body = serializeJson(items);
    } catch (error) {
      logger.error("dynamic_channels_marshal_failed", { message: errorMessage(error) });
      return respondErr(res, new RouteError("serialization_failure", "internal error", { cause: error }));
    }

    try {
      await writeBody(res, 200, { "content-type": "application/json" }, body);
    } catch (error) {
      logger.error("dynamic_channels_write_failed", { message: errorMessage(error) });
      return { status: 500, error: new RouteError("write_failure", "internal error", { cause: error }) };
    }
    return ok();
  };

  return new Map<string, RouteHandler>([
    [ROUTE_API_SETTINGS, handleSettings],
    [ROUTE_PROFILE_IMAGE, handleProfileImage],
    [ROUTE_DYNAMIC_CHANNELS, handleDynamicChannels],
  ]);
}
