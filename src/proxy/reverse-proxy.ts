/**
 * Reverse proxy contract.
 *
 * The proxy is only told which local port serves the live release and where
 * the live release's static assets live. Everything else about its
 * configuration is owned by the driver.
 */

export interface ProxyBackend {
  port: number;
  /** Directory served for the static URL prefix (under the `current` alias) */
  staticRoot: string;
}

export interface ReverseProxy {
  readonly driver: string;

  /**
   * Point the proxy at `backend` and reload it. On failure the previous
   * configuration is back in place when this rejects.
   *
   * @throws {ProxyReloadError}
   */
  apply(backend: ProxyBackend): Promise<void>;

  /**
   * Backend port the proxy currently forwards to, or null when unknown.
   */
  currentPort(): Promise<number | null>;
}

/**
 * Driver for hosts where traffic reaches the live port by other means.
 */
export class NoopProxy implements ReverseProxy {
  readonly driver = 'none';
  private port: number | null = null;

  async apply(backend: ProxyBackend): Promise<void> {
    this.port = backend.port;
  }

  async currentPort(): Promise<number | null> {
    return this.port;
  }
}
