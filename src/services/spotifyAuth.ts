import type { CatalogCredentials } from "../lib/config";
import type { SpotifyTokenResponse } from "./spotifyTypes";

export const TOKEN_URL = "https://accounts.spotify.com/api/token";

// Refresh 60s before expiry
const EXPIRY_MARGIN_MS = 60_000;

export interface TokenProvider {
  getToken(): Promise<string>;
}

/**
 * Exchanges the long-lived refresh token for short-lived access tokens.
 */
export class RefreshTokenProvider implements TokenProvider {
  private accessToken = "";
  private expiresAt = 0;
  private refreshToken: string;

  constructor(
    private readonly credentials: CatalogCredentials,
    private readonly fetchImpl: typeof fetch = fetch,
    private readonly now: () => number = Date.now
  ) {
    this.refreshToken = credentials.refreshToken;
  }

  async getToken(): Promise<string> {
    if (this.accessToken && this.now() < this.expiresAt) {
      return this.accessToken;
    }
    await this.refresh();
    return this.accessToken;
  }

  private async refresh(): Promise<void> {
    const { clientId, clientSecret } = this.credentials;
    const basic = Buffer.from(`${clientId}:${clientSecret}`).toString("base64");
    const response = await this.fetchImpl(TOKEN_URL, {
      method: "POST",
      headers: {
        "Content-Type": "application/x-www-form-urlencoded",
        Authorization: `Basic ${basic}`,
      },
      body: new URLSearchParams({
        grant_type: "refresh_token",
        refresh_token: this.refreshToken,
      }).toString(),
    });

    if (!response.ok) {
      const text = await response.text();
      throw new Error(`Spotify token refresh failed (${response.status}): ${text}`);
    }

    const data = (await response.json()) as SpotifyTokenResponse;
    this.accessToken = data.access_token;
    this.expiresAt = this.now() + data.expires_in * 1000 - EXPIRY_MARGIN_MS;
    // Spotify may rotate the refresh token
    if (data.refresh_token) {
      this.refreshToken = data.refresh_token;
    }
  }
}
