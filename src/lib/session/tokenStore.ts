/** Opaque credential storage. Persistence is up to the host application. */
export interface TokenStore {
  read(): Promise<string | null>;
  write(token: string): Promise<void>;
  delete(): Promise<void>;
}

export class MemoryTokenStore implements TokenStore {
  private token: string | null;

  constructor(initialToken: string | null = null) {
    this.token = initialToken;
  }

  async read() {
    return this.token;
  }

  async write(token: string) {
    this.token = token;
  }

  async delete() {
    this.token = null;
  }
}
