import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import type { Token } from '../../domain/types';

// Resolve data directory - use process.cwd() for better compatibility
const DATA_DIR = path.join(process.cwd(), 'server', 'data');

const tokenListSchema = z.object({
  name: z.string().optional(),
  tokens: z.array(
    z.object({
      chainId: z.number().int(),
      address: z.string(),
      symbol: z.string().optional(),
      name: z.string().optional(),
      decimals: z.number().int().min(0).max(255),
      logoURI: z.string().optional(),
      coingeckoId: z.string().optional(),
    })
  ),
});

export class StorageService {
  constructor(private readonly dataDir: string = DATA_DIR) {}

  /**
   * Parsed JSON content of a data file, or `fallback` when the file does not exist.
   */
  async read(fileName: string, fallback: unknown = null): Promise<unknown> {
    const filePath = path.join(this.dataDir, fileName);
    try {
      const data = await fs.readFile(filePath, 'utf-8');
      const parsed: unknown = JSON.parse(data);
      return parsed;
    } catch (error) {
      if (typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT') {
        return fallback;
      }
      throw error;
    }
  }

  /**
   * Tokens of the token list that belong to `chainId`.
   */
  async getTokensByNetwork(chainId: number, fileName = 'tokens.json'): Promise<Token[]> {
    const raw = await this.read(fileName, { tokens: [] });
    const list = tokenListSchema.parse(raw);
    return list.tokens
      .filter(token => token.chainId === chainId)
      .map(({ address, symbol, name, decimals, logoURI, coingeckoId }) => ({
        address,
        symbol,
        name,
        decimals,
        logoURI,
        coingeckoId,
      }));
  }
}
