export interface UserRecord {
  id: number;
  email: string;
  passwordHash: string | null;
  googleId: string | null;
  name: string | null;
  avatar: string | null;
  emailVerified: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export interface CreateUserInput {
  email: string;
  passwordHash?: string | null;
  googleId?: string | null;
  name?: string | null;
  avatar?: string | null;
  emailVerified?: boolean;
}

export type TokenType = 'email_verification' | 'password_reset';

export const TOKEN_TYPES: readonly TokenType[] = ['email_verification', 'password_reset'];

export interface VerificationTokenRecord {
  id: number;
  userId: number;
  token: string;
  tokenType: TokenType;
  expiresAt: Date;
  usedAt: Date | null;
  createdAt: Date;
}

// ============================================
// USER RELATIONS (snapshot fields are copies taken at write time)
// ============================================

export interface HistoryEntry {
  userId: number;
  episodeSlug: string;
  animeSlug: string;
  episodeTitle: string | null;
  animeTitle: string | null;
  thumbnail: string | null;
  watchedAt: Date;
}

export interface WatchedEpisode {
  episodeSlug: string;
  animeSlug: string;
  episodeTitle?: string | null;
  animeTitle?: string | null;
  thumbnail?: string | null;
}

export interface FavoriteEntry {
  userId: number;
  animeSlug: string;
  animeTitle: string;
  thumbnail: string | null;
  createdAt: Date;
}

export type SubscriptionEntry = FavoriteEntry;

export interface AnimeSnapshot {
  animeSlug: string;
  animeTitle: string;
  thumbnail?: string | null;
}
