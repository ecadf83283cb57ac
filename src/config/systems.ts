/**
 * config/systems.ts — Target repository instances.
 *
 * Each system is an InvenioRDM instance the CLI can upload to. Records on a
 * restricted system are created with restricted record and file access;
 * every other system gets public access.
 *
 * TLS verification is disabled only for the local development instance,
 * which runs with a self-signed certificate.
 */
import { ValidationError } from '../utils/errors';

export interface SystemConfig {
  name: string;
  baseUrl: string;
  restricted: boolean;
  verifyTls: boolean;
}

export const SYSTEMS: Readonly<Record<string, SystemConfig>> = {
  datasafe: {
    name: 'datasafe',
    baseUrl: 'https://datasafe.uni-muenster.de',
    restricted: true,
    verifyTls: true,
  },
  datastore: {
    name: 'datastore',
    baseUrl: 'https://datastore.uni-muenster.de',
    restricted: false,
    verifyTls: true,
  },
  dev: {
    name: 'dev',
    baseUrl: 'https://127.0.0.1:5000',
    restricted: false,
    verifyTls: false,
  },
};

export const SYSTEM_NAMES = Object.keys(SYSTEMS);

/** Case-insensitive lookup; unknown names are a ValidationError */
export function getSystem(name: string): SystemConfig {
  const system = SYSTEMS[name.toLowerCase()];
  if (!system) {
    throw new ValidationError(
      `Unknown system "${name}". Choose one of: ${SYSTEM_NAMES.join(', ')}`,
    );
  }
  return system;
}

/** Where users create a personal access token for a system */
export function tokenUrl(system: SystemConfig): string {
  return `${system.baseUrl}/account/settings/applications/tokens/new/`;
}
