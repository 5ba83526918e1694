import type { Credential } from "@/sync/types";
import type { DeviceTokenPoll, TraktOAuthApi } from "@/sync/trakt/oauth";
import { type Clock, systemClock } from "@/sync/clock";
import { AuthDeniedError, AuthExpiredError, SyncCancelledError } from "@/sync/errors";
import { createChildLogger } from "@/sync/logger";
import type { TokenStore } from "./token-store";

const log = createChildLogger("device-flow");

const SLOW_DOWN_STEP_MS = 5_000;

export type DeviceFlowStatus = "started" | "pending" | "authorized" | "denied" | "expired";

export interface DeviceFlowHandle {
  readonly userCode: string;
  readonly verificationUrl: string;
  readonly expiresAt: Date;
  status(): DeviceFlowStatus;
}

/** Polling state behind a handle; callers never see the device code. */
interface DeviceFlowSession {
  readonly deviceCode: string;
  readonly expiresAt: Date;
  intervalMs: number;
  state: DeviceFlowStatus;
}

export interface CompleteOptions {
  /** Upper bound on polling, independent of the code's own expiry */
  timeoutMs?: number;
  signal?: AbortSignal;
}

type DeviceOAuth = Pick<TraktOAuthApi, "requestDeviceCode" | "pollDeviceToken">;
type CredentialSink = Pick<TokenStore, "save">;

/**
 * Device-code (PIN) login:
 * started → pending → authorized | denied | expired.
 * Only the authorized transition writes a credential.
 */
export class DeviceAuthFlow {
  private readonly clock: Clock;
  private readonly sessions = new WeakMap<DeviceFlowHandle, DeviceFlowSession>();

  constructor(
    private readonly oauth: DeviceOAuth,
    private readonly tokens: CredentialSink,
    clock: Clock = systemClock,
  ) {
    this.clock = clock;
  }

  async start(signal?: AbortSignal): Promise<DeviceFlowHandle> {
    const code = await this.oauth.requestDeviceCode(signal);
    const session: DeviceFlowSession = {
      deviceCode: code.device_code,
      expiresAt: new Date(this.clock.now().getTime() + code.expires_in * 1000),
      intervalMs: code.interval * 1000,
      state: "started",
    };

    const handle: DeviceFlowHandle = {
      userCode: code.user_code,
      verificationUrl: code.verification_url,
      expiresAt: session.expiresAt,
      status: () => session.state,
    };
    this.sessions.set(handle, session);

    log.info("Device code issued", {
      verificationUrl: handle.verificationUrl,
      expiresAt: session.expiresAt.toISOString(),
    });
    return handle;
  }

  async complete(handle: DeviceFlowHandle, options: CompleteOptions = {}): Promise<Credential> {
    const session = this.sessions.get(handle);
    if (!session) {
      throw new Error("Unknown device flow handle, call start() first");
    }
    if (session.state === "authorized" || session.state === "denied" || session.state === "expired") {
      throw new Error(`Device flow already finished (${session.state})`);
    }

    const { signal } = options;
    const deadline =
      options.timeoutMs !== undefined ? this.clock.now().getTime() + options.timeoutMs : Number.POSITIVE_INFINITY;

    while (true) {
      if (signal?.aborted) {
        throw new SyncCancelledError("Device login was cancelled");
      }

      const now = this.clock.now().getTime();
      if (now >= session.expiresAt.getTime()) {
        session.state = "expired";
        log.warn("Device code expired before authorization");
        throw new AuthExpiredError();
      }
      if (now >= deadline) {
        log.warn("Gave up waiting for device authorization", { timeoutMs: options.timeoutMs });
        throw new AuthExpiredError("Timed out waiting for the device code to be authorized", { reason: "timeout" });
      }

      session.state = "pending";
      const result = await this.poll(session, signal);

      switch (result.status) {
        case "authorized":
          this.tokens.save(result.credential);
          session.state = "authorized";
          log.info("Device authorized");
          return result.credential;
        case "denied":
          session.state = "denied";
          log.warn("Device authorization refused", { reason: result.reason });
          throw new AuthDeniedError(undefined, { reason: result.reason });
        case "expired":
          session.state = "expired";
          throw new AuthExpiredError();
        case "slowDown":
          session.intervalMs += SLOW_DOWN_STEP_MS;
          log.debug("Trakt asked to slow down polling", { intervalMs: session.intervalMs });
          break;
        case "unavailable":
          log.warn("Device token poll failed, will retry", { status: result.httpStatus });
          break;
        case "pending":
          break;
      }

      const remaining = Math.min(session.expiresAt.getTime(), deadline) - this.clock.now().getTime();
      await this.wait(Math.max(0, Math.min(session.intervalMs, remaining)), signal);
    }
  }

  private async poll(session: DeviceFlowSession, signal?: AbortSignal): Promise<DeviceTokenPoll> {
    try {
      return await this.oauth.pollDeviceToken(session.deviceCode, signal);
    } catch (error) {
      if (signal?.aborted) {
        throw new SyncCancelledError("Device login was cancelled", {}, error);
      }
      log.warn("Device token poll errored, will retry", {
        error: error instanceof Error ? error.message : String(error),
      });
      return { status: "unavailable", httpStatus: 0 };
    }
  }

  private async wait(ms: number, signal?: AbortSignal): Promise<void> {
    try {
      await this.clock.sleep(ms, signal);
    } catch (error) {
      throw new SyncCancelledError("Device login was cancelled", {}, error);
    }
  }
}
