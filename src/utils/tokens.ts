import crypto from 'crypto';

export const DOWNLOAD_TOKEN_BYTES = 24;

// 24 random bytes encode to 32 URL-safe characters
export const generateDownloadToken = (): string =>
  crypto.randomBytes(DOWNLOAD_TOKEN_BYTES).toString('base64url');
