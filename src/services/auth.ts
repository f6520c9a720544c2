import type { AxiosInstance } from 'axios';
import { TokenError } from '../errors.js';
import type { OAuthConfig } from '../types/config.js';
import { bodyToString, createHttpClient, errorMessage, FORM_CONTENT_TYPE, type HttpOptions, toHttpFailure } from './http.js';

function readAccessToken(body: string): string | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch (error) {
    throw new TokenError(`Error getting access token: response is not JSON (${errorMessage(error)}): ${body}`);
  }
  if (
    typeof parsed === 'object' &&
    parsed !== null &&
    'access_token' in parsed &&
    typeof parsed.access_token === 'string' &&
    parsed.access_token
  ) {
    return parsed.access_token;
  }
  return undefined;
}

/**
 * Exchanges the long-lived refresh token for a short-lived access token.
 * One attempt per run; nothing is cached or written to disk.
 */
export class AuthService {
  private client: AxiosInstance;

  constructor(private config: OAuthConfig, http: HttpOptions) {
    this.client = createHttpClient(http);
  }

  get tokenUrl(): string {
    return `https://${this.config.authHost}/oauth/v2/token`;
  }

  async acquireAccessToken(): Promise<string> {
    const data = new URLSearchParams();
    data.append('refresh_token', this.config.refreshToken);
    data.append('client_id', this.config.clientId);
    data.append('client_secret', this.config.clientSecret);
    data.append('grant_type', 'refresh_token');

    let body: string;
    try {
      const response = await this.client.post<string>(this.tokenUrl, data.toString(), {
        headers: {
          'Content-Type': FORM_CONTENT_TYPE,
        },
      });
      body = bodyToString(response.data);
    } catch (error) {
      throw new TokenError(`Error getting access token: ${errorMessage(error)}`, toHttpFailure(error));
    }

    const accessToken = readAccessToken(body);
    if (!accessToken) {
      throw new TokenError(`Failed to get access token. Response: ${body}`);
    }
    return accessToken;
  }
}
