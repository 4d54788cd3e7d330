export interface TokenData {
  accessToken: string;
  expiresAt: number; // Unix seconds
  tokenType?: string;
  refreshToken?: string;
  idToken?: string;
}

export interface ClientConfig {
  readonly clientId: string;
  readonly clientSecret: string;
  readonly username: string;
  readonly password: string;
  readonly baseUrl: string;
  readonly expiryWindowSeconds: number;
  readonly organizationId?: number;
}
