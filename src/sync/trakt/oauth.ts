import type { Credential } from "@/sync/types";
import type { TraktCredentials } from "@/sync/types/api";
import { AuthRefreshFailedError, SourceUnavailableError } from "@/sync/errors";
import { createChildLogger } from "@/sync/logger";
import { DEFAULT_TRAKT_API_URL, buildUrl, traktHeaders } from "./http";
import { traktDeviceCodeSchema, traktTokenSchema, type TraktDeviceCode, type TraktToken } from "./types";

const log = createChildLogger("trakt-oauth");

const OOB_REDIRECT_URI = "urn:ietf:wg:oauth:2.0:oob";

export type DeviceTokenPoll =
  | { status: "authorized"; credential: Credential }
  | { status: "pending" }
  | { status: "slowDown" }
  | { status: "expired" }
  | { status: "denied"; reason: "denied" | "invalidCode" | "alreadyUsed" }
  | { status: "unavailable"; httpStatus: number };

/** Used by TokenStore so it never needs the whole OAuth surface. */
export interface TokenRefresher {
  refresh(refreshToken: string): Promise<Credential>;
}

export function tokenToCredential(token: TraktToken): Credential {
  return {
    accessToken: token.access_token,
    refreshToken: token.refresh_token ?? null,
    expiresAt: new Date((token.created_at + token.expires_in) * 1000).toISOString(),
  };
}

/** Trakt OAuth endpoints: device code grant and refresh grant. */
export class TraktOAuthApi implements TokenRefresher {
  private baseUrl: string;
  private credentials: TraktCredentials;

  constructor(credentials: TraktCredentials) {
    this.credentials = credentials;
    this.baseUrl = credentials.apiUrl ?? DEFAULT_TRAKT_API_URL;
  }

  private post(path: string, body: Record<string, string>, signal?: AbortSignal): Promise<Response> {
    return fetch(buildUrl(this.baseUrl, path), {
      method: "POST",
      headers: traktHeaders(this.credentials.clientId),
      body: JSON.stringify(body),
      signal,
    });
  }

  async requestDeviceCode(signal?: AbortSignal): Promise<TraktDeviceCode> {
    let response: Response;
    try {
      response = await this.post("/oauth/device/code", { client_id: this.credentials.clientId }, signal);
    } catch (error) {
      throw new SourceUnavailableError("Could not reach Trakt to request a device code", {}, error);
    }

    if (!response.ok) {
      const body = await response.text();
      throw new SourceUnavailableError(`Trakt device code request failed: ${response.status} ${body}`, {
        status: response.status,
      });
    }

    return traktDeviceCodeSchema.parse(await response.json());
  }

  async pollDeviceToken(deviceCode: string, signal?: AbortSignal): Promise<DeviceTokenPoll> {
    const response = await this.post(
      "/oauth/device/token",
      {
        code: deviceCode,
        client_id: this.credentials.clientId,
        client_secret: this.credentials.clientSecret,
      },
      signal,
    );

    switch (response.status) {
      case 200:
        return { status: "authorized", credential: tokenToCredential(traktTokenSchema.parse(await response.json())) };
      case 400:
        return { status: "pending" };
      case 404:
        return { status: "denied", reason: "invalidCode" };
      case 409:
        return { status: "denied", reason: "alreadyUsed" };
      case 410:
        return { status: "expired" };
      case 418:
        return { status: "denied", reason: "denied" };
      case 429:
        return { status: "slowDown" };
      default:
        return { status: "unavailable", httpStatus: response.status };
    }
  }

  async refresh(refreshToken: string): Promise<Credential> {
    log.info("Refreshing Trakt access token");

    let response: Response;
    try {
      response = await this.post("/oauth/token", {
        refresh_token: refreshToken,
        client_id: this.credentials.clientId,
        client_secret: this.credentials.clientSecret,
        redirect_uri: OOB_REDIRECT_URI,
        grant_type: "refresh_token",
      });
    } catch (error) {
      throw new SourceUnavailableError("Could not reach Trakt to refresh the access token", {}, error);
    }

    if (response.status === 400 || response.status === 401) {
      const body = await response.text();
      throw new AuthRefreshFailedError(`Trakt rejected the refresh token: ${response.status} ${body}`, {
        status: response.status,
      });
    }
    if (!response.ok) {
      throw new SourceUnavailableError(`Trakt token refresh failed: ${response.status} ${response.statusText}`, {
        status: response.status,
      });
    }

    const credential = tokenToCredential(traktTokenSchema.parse(await response.json()));
    log.info("Trakt access token refreshed", { expiresAt: credential.expiresAt });
    return credential;
  }
}
