import type { Clock } from "@/sync/clock";
import type { Credential } from "@/sync/types";
import type { CredentialSlot } from "@/sync/ledger/repository";

/** A clock that only moves when something sleeps on it. */
export class ManualClock implements Clock {
  readonly sleeps: number[] = [];
  private current: number;

  constructor(start = "2024-06-01T12:00:00.000Z") {
    this.current = Date.parse(start);
  }

  now(): Date {
    return new Date(this.current);
  }

  advance(ms: number): void {
    this.current += ms;
  }

  async sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) throw signal.reason;
    this.sleeps.push(ms);
    this.current += ms;
  }
}

export class MemoryCredentialSlot implements CredentialSlot {
  constructor(public stored: Credential | null = null) {}

  load(): Credential | null {
    return this.stored;
  }

  save(credential: Credential): void {
    this.stored = credential;
  }

  clear(): void {
    this.stored = null;
  }
}
