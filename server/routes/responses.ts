// =============================================================================
// Response Envelopes
// =============================================================================

import { Response } from 'express';
import { PagedResult } from '../services/common';

export interface ApiResponse<T> {
  success: true;
  data: T;
  message?: string;
}

export function sendOk<T>(res: Response, data: T, message?: string): void {
  const body: ApiResponse<T> = message === undefined ? { success: true, data } : { success: true, data, message };
  res.json(body);
}

export function sendCreated<T>(res: Response, data: T, message?: string): void {
  res.status(201);
  sendOk(res, data, message);
}

export function sendPage<T>(res: Response, page: PagedResult<T>): void {
  res.json({ success: true, data: page.records, pagination: page.pagination });
}

export function sendNoContent(res: Response): void {
  res.status(204).end();
}
