import { DEFAULT_DICE_HOST, DEFAULT_DICE_PORT } from "../shared/endpoints.js";

export function resolveDiceHost(): string {
  const raw = process.env.DICEDB_HOST?.trim();
  return raw ? raw : DEFAULT_DICE_HOST;
}

export function resolveDicePort(): number {
  const raw = process.env.DICEDB_PORT ?? String(DEFAULT_DICE_PORT);
  const parsed = Number.parseInt(raw, 10);
  return Number.isInteger(parsed) && parsed >= 1 && parsed <= 65535 ? parsed : DEFAULT_DICE_PORT;
}
