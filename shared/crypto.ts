import { randomUUID } from 'node:crypto';

export const randomId = (prefix = 'merge'): string => `${prefix}_${randomUUID()}`;
