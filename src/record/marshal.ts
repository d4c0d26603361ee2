/** Content that can be turned into bytes when the recorder asks for it. */
export interface Marshalable {
  /** File extension tag for the encoded bytes, e.g. "json". Empty for raw text. */
  readonly extension: string;
  marshal(signal?: AbortSignal): Promise<Buffer>;
}

export class Raw implements Marshalable {
  readonly extension = "";

  constructor(private readonly value: string) {}

  async marshal(signal?: AbortSignal): Promise<Buffer> {
    signal?.throwIfAborted();
    return Buffer.from(this.value, "utf-8");
  }
}

export class JsonMarshaller implements Marshalable {
  readonly extension = "json";

  constructor(readonly object: unknown) {}

  async marshal(signal?: AbortSignal): Promise<Buffer> {
    signal?.throwIfAborted();
    return Buffer.from(JSON.stringify(this.object), "utf-8");
  }
}
