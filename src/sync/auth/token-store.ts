import type { Credential, CredentialStatus } from "@/sync/types";
import type { CredentialSlot } from "@/sync/ledger/repository";
import type { TokenRefresher } from "@/sync/trakt/oauth";
import { type Clock, systemClock } from "@/sync/clock";
import { UnauthenticatedError } from "@/sync/errors";
import { createChildLogger, maskToken } from "@/sync/logger";

const log = createChildLogger("token-store");

const DEFAULT_REFRESH_MARGIN_MS = 60_000;

/** Anything that can hand out a usable bearer token. */
export interface CredentialProvider {
  getValidCredential(): Promise<Credential>;
}

export interface TokenStoreOptions {
  clock?: Clock;
  /** Refresh this long before the token actually expires */
  refreshMarginMs?: number;
}

export class TokenStore implements CredentialProvider {
  private readonly clock: Clock;
  private readonly refreshMarginMs: number;
  private refreshing: Promise<Credential> | null = null;

  constructor(
    private readonly slot: CredentialSlot,
    private readonly refresher: TokenRefresher,
    options: TokenStoreOptions = {},
  ) {
    this.clock = options.clock ?? systemClock;
    this.refreshMarginMs = options.refreshMarginMs ?? DEFAULT_REFRESH_MARGIN_MS;
  }

  async getValidCredential(): Promise<Credential> {
    const stored = this.slot.load();
    if (!stored) {
      throw new UnauthenticatedError();
    }

    if (this.isFresh(stored)) {
      return stored;
    }

    if (!stored.refreshToken) {
      throw new UnauthenticatedError("Stored Trakt token has expired and cannot be refreshed. Log in again.");
    }

    return this.refresh(stored.refreshToken);
  }

  /** Only the device flow and the refresh below write here. */
  save(credential: Credential): void {
    this.slot.save(credential);
    log.info("Trakt credential stored", {
      accessToken: maskToken(credential.accessToken),
      expiresAt: credential.expiresAt,
    });
  }

  clear(): void {
    this.slot.clear();
    log.info("Trakt credential cleared");
  }

  status(): CredentialStatus {
    const stored = this.slot.load();
    return {
      authenticated: stored !== null && (this.isFresh(stored) || stored.refreshToken !== null),
      expiresAt: stored?.expiresAt ?? null,
      canRefresh: stored?.refreshToken != null,
    };
  }

  private isFresh(credential: Credential): boolean {
    return Date.parse(credential.expiresAt) - this.refreshMarginMs > this.clock.now().getTime();
  }

  private refresh(refreshToken: string): Promise<Credential> {
    if (!this.refreshing) {
      this.refreshing = this.refresher
        .refresh(refreshToken)
        .then((credential) => {
          // Trakt normally rotates the refresh token; keep the old one if it didn't send a new one
          const next: Credential = { ...credential, refreshToken: credential.refreshToken ?? refreshToken };
          this.save(next);
          return next;
        })
        .finally(() => {
          this.refreshing = null;
        });
    }
    return this.refreshing;
  }
}
