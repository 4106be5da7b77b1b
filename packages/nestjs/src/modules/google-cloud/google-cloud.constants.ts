import { Inject } from "@nestjs/common";

export const GOOGLE_AUTH = Symbol("google-auth");

export const GOOGLE_CLOUD_SCOPES = [
  "https://www.googleapis.com/auth/cloud-platform",
];

export const InjectGoogleAuth = () => Inject(GOOGLE_AUTH);
