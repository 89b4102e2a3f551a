export class AccountLockedError extends Error {
  constructor(
    public readonly account: string,
    public readonly txnId: string,
    public readonly lockedBy: string,
  ) {
    super(`Account ${account} is locked by transaction ${lockedBy}, not ${txnId}`);
    this.name = "AccountLockedError";
  }
}

export class InsufficientFundsError extends Error {
  constructor(
    public readonly account: string,
    public readonly balance: number,
    public readonly delta: number,
  ) {
    super(`Account ${account} cannot apply ${delta} to a balance of ${balance}`);
    this.name = "InsufficientFundsError";
  }
}

export class UnknownAccountError extends Error {
  constructor(public readonly account: string) {
    super(`Unknown account: ${account}`);
    this.name = "UnknownAccountError";
  }
}
