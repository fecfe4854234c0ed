import { type SiteAdapter, SessionExpiredError } from "../site/types.js";

/**
 * Validates the adapter's session the first time an entry point needs it.
 * A successful check is remembered for the rest of the run; a failed one is
 * retried on the next call, after the operator had a chance to log in.
 */
export class SessionGuard {
  private validated: Promise<void> | null = null;

  constructor(private readonly adapter: Pick<SiteAdapter, "validateSession">) {}

  async ensureValid(url: string): Promise<void> {
    this.validated ??= this.check(url);
    try {
      await this.validated;
    } catch (error) {
      this.validated = null;
      throw error;
    }
  }

  private async check(url: string): Promise<void> {
    if (!(await this.adapter.validateSession())) {
      throw new SessionExpiredError(url);
    }
  }
}
