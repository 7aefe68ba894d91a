/**
 * User representation for token minting
 * This is what the pluggable user directory returns
 */
export interface User {
  // Subject identifier (unique user ID)
  id: string;
  email?: string;
  roles?: string[];
}
