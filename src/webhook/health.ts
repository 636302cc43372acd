/**
 * Health Check Endpoint Handler
 *
 * Returns server status, kill switch state, storage mode, CRM token state,
 * version, and timestamp. Used by load balancers, monitoring, and manual
 * verification.
 */

import type { Request, Response } from 'express';
import { appConfig } from '../config.js';
import type { TokenState } from '../auth/token-manager.js';

export interface HealthInfo {
  storageMode: 'postgres' | 'memory';
  tokenState: () => TokenState;
}

export function createHealthHandler(info: HealthInfo) {
  return (_req: Request, res: Response): void => {
    const tokenState = info.tokenState();
    res.json({
      status: tokenState === 'credential_expired' ? 'degraded' : 'ok',
      timestamp: new Date().toISOString(),
      killSwitch: appConfig.killSwitch,
      storage: info.storageMode,
      crmToken: tokenState,
      version: process.env.npm_package_version ?? 'dev',
    });
  };
}
