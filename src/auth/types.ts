export type AccessDecision =
  | { status: 'granted'; credential: string }
  | { status: 'denied' }
  | { status: 'unauthenticated' }
  | { status: 'unavailable' };

export type GrantedDecision = Extract<AccessDecision, { status: 'granted' }>;

export interface AuthResult {
  authenticated: true;
  message: string;
  token: string;
}
