import { Request, Response } from 'express';

export interface BotStatusSource {
  readonly username: string | undefined;
}

/**
 * Reports whether the chat bot is running so the web client can link to it
 */
export class TelegramController {
  constructor(private readonly bot?: BotStatusSource) {}

  getStatus(_req: Request, res: Response): void {
    res.json({
      enabled: this.bot !== undefined,
      username: this.bot?.username ?? null,
    });
  }
}
