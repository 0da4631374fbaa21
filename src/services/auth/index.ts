export { AuthService, AUTH_MESSAGES } from './AuthService.js';
export type { AuthServiceDeps, SignupRequest, MessageResult } from './AuthService.js';
export { TokenService } from './TokenService.js';
export type { TokenPair, TokenScope, TokenServiceOptions } from './TokenService.js';
export { UserService } from './UserService.js';
export type { UserServiceDeps } from './UserService.js';
