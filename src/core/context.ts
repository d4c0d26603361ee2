import { DEFAULT_NAMESPACE, type GatherReport } from "./models.js";

export interface CollectCallbacks {
  onGatherStart?: (name: string) => void;
  onGatherComplete?: (report: GatherReport) => void;
}

export class CollectContext {
  /** Prefix of the report record name. */
  readonly namespace: string;
  readonly callbacks: CollectCallbacks;

  constructor(opts: { namespace?: string; callbacks?: CollectCallbacks } = {}) {
    this.namespace = opts.namespace ?? DEFAULT_NAMESPACE;
    this.callbacks = opts.callbacks ?? {};
  }

  get reportName(): string {
    return `${this.namespace}/gathers`;
  }
}
