import { errorMessage, type Logger } from "../config/logger";
import type { DirectoryService } from "../directory/interfaces";
import type { ValidatedConfiguration } from "../settings/configuration";

export type AuthorizationSettings = Pick<ValidatedConfiguration, "permittedUsers" | "allowedEmailDomains">;

export interface Authorizer {
  isAuthorizedIdentity(userId: string, settings: AuthorizationSettings): Promise<boolean>;
}

export function emailMatchesDomain(email: string, domain: string): boolean {
  return email.toLowerCase().endsWith(`@${domain.toLowerCase()}`);
}

/**
 * A user is authorized when listed by id, or when their directory email sits
 * under one of the allowed domains. Lookup failures count as "no".
 */
export function createAuthorizer(params: { directory: DirectoryService; logger: Logger }): Authorizer {
  const { directory, logger } = params;

  return {
    async isAuthorizedIdentity(userId, { permittedUsers, allowedEmailDomains }) {
      if (!userId) return false;
      if (permittedUsers.includes(userId)) return true;
      if (allowedEmailDomains.length === 0) return false;

      try {
        const user = await directory.getUser(userId);
        if (!user) return false;
        return allowedEmailDomains.some((domain) => emailMatchesDomain(user.email, domain));
      } catch (error) {
        logger.warn("authorization_user_lookup_failed", { userId, message: errorMessage(error) });
        return false;
      }
    },
  };
}
