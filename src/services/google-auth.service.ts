/**
 * Google Auth Service
 *
 * Turns the configured OAuth2 client credentials and refresh token into
 * short-lived access tokens for the Photos Library API. The access token is
 * kept in memory only and refreshed shortly before it expires.
 */
import type {
  OAuthErrorResponse,
  OAuthTokenResponse,
} from '@root/types/google-photos.types.js'
import { createServiceLogger } from '@utils/logger.js'
import type { FastifyBaseLogger } from 'fastify'

export const TOKEN_ENDPOINT = 'https://oauth2.googleapis.com/token'

/** Refresh this many ms before expiry */
const REFRESH_BUFFER_MS = 5 * 60 * 1000

export class GoogleAuthError extends Error {
  constructor(
    message: string,
    public readonly status?: number,
    public readonly code?: string,
  ) {
    super(message)
    this.name = 'GoogleAuthError'
  }
}

export interface GoogleCredentials {
  clientId: string
  clientSecret: string
  refreshToken: string
}

export interface AccessTokenProvider {
  getAccessToken(): Promise<string>
}

export class GoogleAuthService implements AccessTokenProvider {
  private accessToken: string | null = null
  private expiresAt = 0
  private inFlightRefresh: Promise<string> | null = null
  private readonly log: FastifyBaseLogger

  constructor(
    baseLog: FastifyBaseLogger,
    private readonly credentials: GoogleCredentials,
    private readonly requestTimeoutMs: number,
  ) {
    this.log = createServiceLogger(baseLog, 'GOOGLE_AUTH')
  }

  /** True when a refresh token and client credentials are configured */
  get isConfigured(): boolean {
    const { clientId, clientSecret, refreshToken } = this.credentials
    return Boolean(clientId && clientSecret && refreshToken)
  }

  /** Returns a valid access token, refreshing if necessary. */
  async getAccessToken(): Promise<string> {
    if (this.accessToken && Date.now() < this.expiresAt - REFRESH_BUFFER_MS) {
      return this.accessToken
    }

    // Share one refresh between concurrent callers
    if (!this.inFlightRefresh) {
      this.inFlightRefresh = this.refreshAccessToken().finally(() => {
        this.inFlightRefresh = null
      })
    }
    return this.inFlightRefresh
  }

  /** Drops the cached token so the next call refreshes */
  invalidate(): void {
    this.accessToken = null
    this.expiresAt = 0
  }

  private async refreshAccessToken(): Promise<string> {
    if (!this.isConfigured) {
      throw new GoogleAuthError(
        'Google credentials are not configured (googleClientId, googleClientSecret, googleRefreshToken)',
      )
    }

    let response: Response
    try {
      response = await fetch(TOKEN_ENDPOINT, {
        method: 'POST',
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
        body: new URLSearchParams({
          grant_type: 'refresh_token',
          refresh_token: this.credentials.refreshToken,
          client_id: this.credentials.clientId,
          client_secret: this.credentials.clientSecret,
        }),
        signal: AbortSignal.timeout(this.requestTimeoutMs),
      })
    } catch (error) {
      throw new GoogleAuthError(
        `Network error during token refresh: ${error instanceof Error ? error.message : String(error)}`,
      )
    }

    if (!response.ok) {
      const oauthError = await readOAuthError(response)
      if (oauthError.error === 'invalid_grant') {
        this.invalidate()
        throw new GoogleAuthError(
          'The refresh token is invalid or has been revoked; re-authorize the application',
          response.status,
          oauthError.error,
        )
      }
      throw new GoogleAuthError(
        `Token refresh failed: ${response.status} ${oauthError.error_description ?? oauthError.error ?? response.statusText}`,
        response.status,
        oauthError.error,
      )
    }

    const body = (await response.json()) as OAuthTokenResponse
    if (!body.access_token) {
      throw new GoogleAuthError('Token endpoint returned no access token')
    }

    this.accessToken = body.access_token
    this.expiresAt = Date.now() + body.expires_in * 1000
    this.log.debug(`Access token refreshed, valid for ${body.expires_in}s`)
    return body.access_token
  }
}

async function readOAuthError(response: Response): Promise<OAuthErrorResponse> {
  try {
    return (await response.json()) as OAuthErrorResponse
  } catch {
    return { error_description: response.statusText }
  }
}
