import { randomUUID } from "crypto";

export class SessionId {
  private constructor(private readonly _value: string) {
    if (!_value || _value.trim().length === 0) {
      throw new Error("SessionId cannot be empty");
    }
  }

  public static create(): SessionId {
    return new SessionId(randomUUID());
  }

  public static fromString(value: string): SessionId {
    return new SessionId(value);
  }

  public get value(): string {
    return this._value;
  }

  /** First eight characters, the form operators type to address a session. */
  public get short(): string {
    return this._value.slice(0, 8);
  }

  public equals(other: SessionId): boolean {
    return this._value === other._value;
  }

  public toString(): string {
    return this._value;
  }
}
