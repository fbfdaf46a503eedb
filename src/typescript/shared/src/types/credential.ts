export interface TenantCredential {
  tenantId: number;
  accessToken: string;
  refreshToken: string;
  expiresAt: Date;
  scope: string | null;
}

/** Values written by a refresh. Access token, refresh token and expiry always move together. */
export interface TokenRotation {
  accessToken: string;
  refreshToken: string;
  expiresAt: Date;
}
