import { Request, Response } from 'express';
import type { AppConfig } from '../config/index.js';

export class VersionController {
  constructor(private readonly config: Pick<AppConfig, 'appVersion' | 'minAppVersion'>) {}

  getVersion = (req: Request, res: Response) => {
    res.json({
      success: true,
      data: {
        version: this.config.appVersion,
        minimumVersion: this.config.minAppVersion,
      },
    });
  };
}
