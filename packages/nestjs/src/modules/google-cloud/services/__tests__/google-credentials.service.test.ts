import type { HttpService } from "@nestjs/axios";
import { AxiosHeaders } from "axios";
import type { GoogleAuth } from "google-auth-library";
import { beforeEach, describe, expect, it, vi } from "vitest";

import { GoogleCredentialsService } from "../google-credentials.service";

describe("GoogleCredentialsService", () => {
  let service: GoogleCredentialsService;
  let getAccessToken: ReturnType<typeof vi.fn>;
  let use: ReturnType<typeof vi.fn>;
  let httpService: HttpService;

  beforeEach(() => {
    getAccessToken = vi.fn().mockResolvedValue("test-token");
    use = vi.fn();

    service = new GoogleCredentialsService({
      getAccessToken,
    } as unknown as GoogleAuth);

    httpService = {
      axiosRef: { interceptors: { request: { use } } },
    } as unknown as HttpService;
  });

  it("should return the access token", async () => {
    await expect(service.getAccessToken()).resolves.toBe("test-token");
  });

  it("should fail when no token is available", async () => {
    getAccessToken.mockResolvedValue(null);

    await expect(service.getAccessToken()).rejects.toThrow(
      "Google Cloud credentials did not yield an access token",
    );
  });

  it("should attach a bearer token to every request", async () => {
    service.authorize(httpService);

    expect(use).toHaveBeenCalledTimes(1);
    const [onFulfilled] = use.mock.calls[0];
    const config = await onFulfilled({ headers: new AxiosHeaders() });

    expect(config.headers.Authorization).toBe("Bearer test-token");
    expect(getAccessToken).toHaveBeenCalledTimes(1);
  });

  it("should send the static token without looking up credentials", async () => {
    service.authorize(httpService, "owner");

    const [onFulfilled] = use.mock.calls[0];
    const config = await onFulfilled({ headers: new AxiosHeaders() });

    expect(config.headers.Authorization).toBe("Bearer owner");
    expect(getAccessToken).not.toHaveBeenCalled();
  });
});
