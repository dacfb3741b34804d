import { Account, AccountId } from '../../src/domain/account';

export interface UserRecord {
  id: string;
  name: string;
  admin: boolean;
}

export type Directory = Map<string, UserRecord>;

export function makeDirectory(records: UserRecord[]): Directory {
  return new Map(records.map((r) => [r.id, r]));
}

/** Account backed by an in-memory directory; the zero value has no record. */
export class TestAccount implements Account<TestAccount> {
  private authenticated = false;

  constructor(
    private readonly directory: Directory,
    readonly record?: UserRecord,
  ) {}

  isAuthenticated(): boolean {
    return this.authenticated;
  }

  isAdmin(): boolean {
    return this.record?.admin ?? false;
  }

  login(): void {
    this.authenticated = true;
  }

  logout(): void {
    this.authenticated = false;
  }

  uniqueId(): AccountId {
    return this.record?.id ?? '';
  }

  async getById(id: AccountId): Promise<TestAccount> {
    const record = this.directory.get(String(id));
    if (!record) {
      throw new Error(`no account with id ${id}`);
    }
    return new TestAccount(this.directory, record);
  }
}

/** Same directory lookup, answered without a promise. */
export class SyncTestAccount implements Account<SyncTestAccount> {
  private authenticated = false;

  constructor(
    private readonly directory: Directory,
    readonly record?: UserRecord,
  ) {}

  isAuthenticated(): boolean {
    return this.authenticated;
  }

  isAdmin(): boolean {
    return this.record?.admin ?? false;
  }

  login(): void {
    this.authenticated = true;
  }

  logout(): void {
    this.authenticated = false;
  }

  uniqueId(): AccountId {
    return this.record?.id ?? '';
  }

  getById(id: AccountId): SyncTestAccount {
    const record = this.directory.get(String(id));
    if (!record) {
      throw new Error(`no account with id ${id}`);
    }
    return new SyncTestAccount(this.directory, record);
  }
}
