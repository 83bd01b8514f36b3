import { saveState } from '../state/atomic-store.js';

export interface LivenessRecord {
  timestamp: number;
  datetime: string;
  source: string;
  version: string;
  state?: string;
}

/** Something an external supervisor can poll to see the watcher is alive. */
export interface LivenessReporter {
  beat(source: string, state?: string): Promise<void>;
}

export class FileHeartbeatReporter implements LivenessReporter {
  constructor(
    private readonly filePath: string,
    private readonly version: string,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async beat(source: string, state?: string): Promise<void> {
    const at = this.now();
    const record: LivenessRecord = {
      timestamp: Math.floor(at.getTime() / 1000),
      datetime: at.toISOString(),
      source,
      version: this.version,
      ...(state ? { state } : {}),
    };
    await saveState(this.filePath, record);
  }
}
