import './config.js';

/**
 * Looks up deployment secrets by logical name. A `null` result means the
 * secret is not configured and the feature depending on it is switched off.
 */
export interface SecretResolver {
  resolve(name: string): Promise<string | null>;
}

export const envSecretResolver: SecretResolver = {
  async resolve(name: string) {
    const value = process.env[name]?.trim();
    return value ? value : null;
  },
};

export const SECRET_NAMES = {
  receiptUrl: 'RECEIPT_FUNCTION_URL',
  dailySummaryUrl: 'DAILY_SUMMARY_FUNCTION_URL',
} as const;
