import { fileURLToPath } from 'url';

export const CONTRACTS_PATH = fileURLToPath(new URL('../contracts', import.meta.url));
export const RULES_DIR = fileURLToPath(new URL('../rules', import.meta.url));
