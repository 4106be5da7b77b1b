import type { HttpService } from "@nestjs/axios";
import { Injectable, Logger } from "@nestjs/common";
import type { GoogleAuth } from "google-auth-library";

import { InjectGoogleAuth } from "../google-cloud.constants";

/**
 * Supplies OAuth2 bearer tokens for the Google Cloud REST APIs.
 */
@Injectable()
export class GoogleCredentialsService {
  private readonly logger = new Logger(GoogleCredentialsService.name);

  constructor(@InjectGoogleAuth() private readonly auth: GoogleAuth) {}

  async getAccessToken(): Promise<string> {
    // google-auth-library caches the token and refreshes it before expiry
    const token = await this.auth.getAccessToken();
    if (!token) {
      throw new Error("Google Cloud credentials did not yield an access token");
    }
    return token;
  }

  /**
   * Sets auth via an interceptor so the token is refreshed on every call when
   * required. A `staticToken` replaces the credential lookup, which is what
   * the local emulators expect.
   */
  authorize(httpService: HttpService, staticToken?: string): void {
    httpService.axiosRef.interceptors.request.use(
      async (config) => {
        const token = staticToken ?? (await this.getAccessToken());
        config.headers.Authorization = `Bearer ${token}`;
        return config;
      },
      (error: unknown) => {
        this.logger.error("Failed to prepare Google Cloud request", error);
        return Promise.reject(
          error instanceof Error ? error : new Error(String(error)),
        );
      },
    );
  }
}
