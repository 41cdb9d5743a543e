export interface Lease {
  /** Returns true only for the call that actually released the flag */
  release(): boolean;
}

export interface ExclusiveFlagStats {
  name: string;
  held: boolean;
  acquisitions: number;
  releases: number;
}

/**
 * Device exclusivity flag. `tryAcquire` tests and sets in one synchronous
 * step, so two callers on the event loop can never both win.
 */
export class ExclusiveFlag {
  private held = false;
  private acquisitions = 0;
  private releases = 0;

  constructor(private readonly name: string) {}

  tryAcquire(): Lease | null {
    if (this.held) return null;
    this.held = true;
    this.acquisitions += 1;

    let released = false;
    return {
      release: () => {
        if (released) return false;
        released = true;
        this.held = false;
        this.releases += 1;
        return true;
      },
    };
  }

  isHeld(): boolean {
    return this.held;
  }

  getStats(): ExclusiveFlagStats {
    return {
      name: this.name,
      held: this.held,
      acquisitions: this.acquisitions,
      releases: this.releases,
    };
  }
}
