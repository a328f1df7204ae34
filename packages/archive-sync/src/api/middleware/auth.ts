import type { TokenManager } from '../token-manager.js';

export async function getAuthHeaders(tokens: TokenManager): Promise<Record<string, string>> {
  return {
    'Authorization': `Bearer ${await tokens.get()}`,
  };
}
