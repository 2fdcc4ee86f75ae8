import type { Response } from 'express';

export const PLAIN_TEXT = 'text/plain; charset=utf-8';
export const HTML = 'text/html; charset=utf-8';

/** Complete plain-text response, used for rejections and the static text pages. */
export function sendPlain(res: Response, status: number, body: string): void {
  res
    .status(status)
    .set({ 'Content-Type': PLAIN_TEXT, 'Access-Control-Allow-Origin': '*' })
    .send(body);
}
