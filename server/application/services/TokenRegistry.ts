import { formatUnits, getAddress, isAddress, parseUnits } from 'ethers';
import { StorageService } from './StorageService';
import { Token, normalizeAddress } from '../../domain/types';
import { InvalidQuoteRequestError, TokenResolutionError } from '../../domain/errors';

/**
 * On-chain metadata for an address that is not in the token list.
 */
export type TokenMetadataLookup = (address: string) => Promise<Token>;

/**
 * Known tokens of one chain, loaded from the token list file.
 *
 * Identifiers are resolved as symbols first, then as addresses. An address
 * missing from the list is still accepted when its metadata can be read
 * on-chain.
 */
export class TokenRegistry {
  private byAddress: Map<string, Token> = new Map();
  private bySymbol: Map<string, Token[]> = new Map();

  constructor(tokens: Token[], private readonly metadataLookup?: TokenMetadataLookup) {
    for (const token of tokens) {
      this.add(token);
    }
  }

  static async load(storage: StorageService, chainId: number, metadataLookup?: TokenMetadataLookup): Promise<TokenRegistry> {
    const tokens = await storage.getTokensByNetwork(chainId);
    console.log(`✓ [TOKENS] Loaded ${tokens.length} token(s) for chain ${chainId}`);
    return new TokenRegistry(tokens, metadataLookup);
  }

  public get size(): number {
    return this.byAddress.size;
  }

  public list(): Token[] {
    return Array.from(this.byAddress.values());
  }

  public findByAddress(address: string): Token | undefined {
    return this.byAddress.get(normalizeAddress(address));
  }

  /**
   * Tokens matching an address, a symbol (case-insensitive) or, failing
   * that, an exact name (case-insensitive).
   *
   * @throws TokenResolutionError (TOKEN_NOT_FOUND) when nothing matches
   */
  public async search(query: string): Promise<Token[]> {
    const q = query.trim();
    if (!q) {
      throw new InvalidQuoteRequestError('Query parameter is required', 'query');
    }

    if (isAddress(q)) {
      return [await this.resolveAddress(q)];
    }

    const bySymbol = this.bySymbol.get(q.toUpperCase());
    if (bySymbol) {
      return [...bySymbol];
    }

    const lower = q.toLowerCase();
    const byName = this.list().filter(token => token.name?.toLowerCase() === lower);
    if (byName.length === 0) {
      throw new TokenResolutionError(q, 'TOKEN_NOT_FOUND');
    }
    return byName;
  }

  /**
   * Exactly one token for a symbol or an address.
   *
   * @throws TokenResolutionError AMBIGUOUS_TOKEN when a symbol names several tokens
   * @throws TokenResolutionError TOKEN_NOT_FOUND otherwise
   */
  public async resolve(identifier: string): Promise<Token> {
    const id = identifier.trim();
    if (!id) {
      throw new InvalidQuoteRequestError('Token identifier cannot be empty', 'token');
    }

    const bySymbol = this.bySymbol.get(id.toUpperCase());
    if (bySymbol) {
      if (bySymbol.length > 1) {
        throw new TokenResolutionError(id, 'AMBIGUOUS_TOKEN', bySymbol.map(t => t.address));
      }
      return bySymbol[0];
    }

    if (isAddress(id)) {
      return this.resolveAddress(id);
    }

    throw new TokenResolutionError(id, 'TOKEN_NOT_FOUND');
  }

  /**
   * Human decimal string ("1.5") to base units.
   */
  public parseAmount(amount: string, token: Token): bigint {
    try {
      return parseUnits(amount.trim(), token.decimals);
    } catch {
      throw new InvalidQuoteRequestError(
        `Invalid amount '${amount}' for a token with ${token.decimals} decimals`,
        'amount'
      );
    }
  }

  public formatAmount(amount: bigint, token: Token): string {
    return formatUnits(amount, token.decimals);
  }

  private add(token: Token): void {
    const stored: Token = { ...token, address: getAddress(token.address) };
    this.byAddress.set(normalizeAddress(stored.address), stored);

    if (stored.symbol) {
      const key = stored.symbol.toUpperCase();
      const existing = this.bySymbol.get(key) ?? [];
      existing.push(stored);
      this.bySymbol.set(key, existing);
    }
  }

  private async resolveAddress(address: string): Promise<Token> {
    const known = this.findByAddress(address);
    if (known) return known;

    if (!this.metadataLookup) {
      throw new TokenResolutionError(address, 'TOKEN_NOT_FOUND');
    }

    try {
      const token = await this.metadataLookup(address);
      this.byAddress.set(normalizeAddress(token.address), token);
      return token;
    } catch (error) {
      console.warn(`⚠️ [TOKENS] Metadata lookup failed for ${address.slice(0, 10)}...:`, error instanceof Error ? error.message : error);
      throw new TokenResolutionError(address, 'TOKEN_NOT_FOUND');
    }
  }
}
