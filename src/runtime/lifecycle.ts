import { LspError } from "../protocol/errors";
import type { Logger } from "../util/log";

export type ServerState = "created" | "connected" | "running" | "shutting-down" | "closed";

// Listening transports go straight from created to running; connections
// attach to a server that is already running.
const TRANSITIONS: Record<ServerState, readonly ServerState[]> = {
  created: ["connected", "running", "shutting-down"],
  connected: ["running", "shutting-down"],
  running: ["shutting-down"],
  "shutting-down": ["closed"],
  closed: [],
};

export class Lifecycle {
  private current: ServerState = "created";
  private resolveClosed: () => void = () => {};
  readonly closed: Promise<void>;

  constructor(private readonly logger: Logger) {
    this.closed = new Promise((resolve) => {
      this.resolveClosed = resolve;
    });
  }

  get state(): ServerState {
    return this.current;
  }

  is(...states: ServerState[]): boolean {
    return states.includes(this.current);
  }

  transition(next: ServerState): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new LspError(`Invalid server state transition: ${this.current} -> ${next}`);
    }
    this.logger.debug(`Server state ${this.current} -> ${next}`);
    this.current = next;
    if (next === "closed") this.resolveClosed();
  }
}
