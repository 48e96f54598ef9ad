import {
  AccountReferenceSchema,
  AccountRegistryFileSchema,
  ACCOUNT_MASK_MIN_LENGTH,
  RegistryError,
  sanitizeText,
  type AccountReference,
  type ExtractedField,
} from '@ledgerline/types';
import { DEFAULT_ACCOUNT_REFERENCES } from './default-accounts.js';

const MASK_PATTERN = new RegExp(`X{${ACCOUNT_MASK_MIN_LENGTH},}`);
const NOISE = /[^A-Za-z0-9]/g;

function companyKey(name: string): string {
  return sanitizeText(name).toLowerCase();
}

/**
 * Closed set of known accounts. Instances are immutable and safe to share between
 * concurrent documents; tests build their own through `fromReferences`.
 */
export class AccountRegistry {
  private readonly references: readonly AccountReference[];
  private readonly byId: ReadonlyMap<string, AccountReference>;

  private constructor(references: readonly AccountReference[]) {
    this.references = Object.freeze(references.map((ref) => Object.freeze({ ...ref })));
    this.byId = new Map(this.references.map((ref) => [ref.canonical_id, ref]));
  }

  static fromReferences(references: readonly AccountReference[]): AccountRegistry {
    const seen = new Set<string>();
    for (const ref of references) {
      const parsed = AccountReferenceSchema.safeParse(ref);
      if (!parsed.success) {
        throw new RegistryError(`Invalid account reference: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`, parsed.error.issues);
      }
      if (seen.has(ref.canonical_id)) {
        throw new RegistryError(`Duplicate canonical account id: ${ref.canonical_id}`);
      }
      seen.add(ref.canonical_id);
    }
    return new AccountRegistry(references);
  }

  /** Builds a registry from a parsed registry file (`{ "accounts": [...] }`). */
  static fromJSON(input: unknown): AccountRegistry {
    const parsed = AccountRegistryFileSchema.safeParse(input);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue !== undefined && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
      throw new RegistryError(`Invalid registry file${where}: ${issue?.message ?? 'unknown issue'}`, parsed.error.issues);
    }
    return AccountRegistry.fromReferences(parsed.data.accounts);
  }

  list(): readonly AccountReference[] {
    return this.references;
  }

  get size(): number {
    return this.references.length;
  }

  has(canonicalId: string): boolean {
    return this.byId.has(canonicalId);
  }

  get(canonicalId: string): AccountReference | undefined {
    return this.byId.get(canonicalId);
  }

  /**
   * Entries whose company name and `hint` contain one another, ignoring case and
   * punctuation.
   */
  findByCompany(hint: string): AccountReference[] {
    const key = companyKey(hint);
    if (key === '') return [];
    return this.references.filter((ref) => {
      const name = companyKey(ref.company_name);
      return name.includes(key) || key.includes(name);
    });
  }

  /**
   * Resolves a raw account token to its canonical entry.
   *
   * Noise is stripped first. A masked token (four or more `X`) resolves only through
   * the company hint, and only when exactly one entry fits the hint; digits left visible
   * around the mask must then agree with that entry. Anything else must equal a canonical id exactly.
   */
  normalize(raw: string, companyHint: string | null): ExtractedField<AccountReference> {
    const stripped = raw.replace(NOISE, '');
    if (stripped === '') {
      return { present: false, rawSpan: raw };
    }

    const mask = MASK_PATTERN.exec(stripped);
    if (mask !== null) {
      return this.resolveMasked(raw, stripped, mask, companyHint);
    }

    const ref = this.byId.get(stripped);
    return ref === undefined ? { present: false, rawSpan: raw } : { present: true, value: ref, rawSpan: raw };
  }

  private resolveMasked(
    raw: string,
    stripped: string,
    mask: RegExpExecArray,
    companyHint: string | null
  ): ExtractedField<AccountReference> {
    if (companyHint === null) {
      return { present: false, rawSpan: raw };
    }

    const prefix = stripped.slice(0, mask.index);
    const suffix = stripped.slice(mask.index + mask[0].length);
    if (!/^\d*$/.test(prefix) || !/^\d*$/.test(suffix)) {
      return { present: false, rawSpan: raw };
    }

    const candidates = this.findByCompany(companyHint);
    const [only] = candidates;
    if (candidates.length !== 1 || only === undefined) {
      return { present: false, rawSpan: raw };
    }
    // Visible digits can only reject the single company match, never choose between several
    if (!only.canonical_id.startsWith(prefix) || !only.canonical_id.endsWith(suffix)) {
      return { present: false, rawSpan: raw };
    }
    return { present: true, value: only, rawSpan: raw };
  }
}

export const defaultAccountRegistry = AccountRegistry.fromReferences(DEFAULT_ACCOUNT_REFERENCES);
