/**
 * Single-writer lock for index mutations. Acquisition never waits: a second
 * writer is turned away and the caller decides what to report.
 */
export class WriteLock {
  private owner: string | null = null;

  isHeld(): boolean {
    return this.owner !== null;
  }

  currentOwner(): string | null {
    return this.owner;
  }

  tryAcquire(owner: string): boolean {
    if (this.owner !== null) return false;
    this.owner = owner;
    return true;
  }

  release(owner: string): void {
    if (this.owner === owner) this.owner = null;
  }
}
