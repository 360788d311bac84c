/**
 * clubscan
 *
 * Library entry point. The CLI lives in cli.ts.
 */

export * from './config/environment';
export { AxiosHttpClient, createAxiosInstance, HttpClient, HttpResponse } from './config/http-client';
export * from './models/club';
export * from './models/errors';
export * from './models/game';
export * from './models/player';
export * from './models/provider';
export * from './models/tournament';
export { CookieAuthProvider, applySessionAuth } from './middleware/session-auth';
export { ChessComProvider, createChessComProvider } from './providers/chesscom-provider';
export { ResponseCache } from './repositories/response-cache';
export { averageAccuracy, dedupeGames, rankGames } from './utils/game-ranking';
