// 呼び出し側の契約違反。ドライバまで伝搬させ、ここでは回復しない。
export class TypeMismatchError extends Error {
  detail?: unknown;

  constructor(message: string, detail?: unknown) {
    super(message);
    this.name = "TypeMismatchError";
    this.detail = detail;
  }
}

export class InvalidAddressError extends Error {
  detail?: unknown;

  constructor(message: string, detail?: unknown) {
    super(message);
    this.name = "InvalidAddressError";
    this.detail = detail;
  }
}
