export class ResponseTooLargeError extends Error {
  constructor(
    public readonly size: number,
    public readonly limit: number,
  ) {
    super(`response of ${size} bytes exceeds the ${limit} byte buffer`);
    this.name = "ResponseTooLargeError";
  }
}

export class ListenerClosedError extends Error {
  constructor() {
    super("listener closed");
    this.name = "ListenerClosedError";
  }
}
