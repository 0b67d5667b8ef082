import dotenv from 'dotenv';
import { BUFFER_LIMITS } from './booking';

dotenv.config();

type IntegerEnv = 'PORT' | 'BUFFER_MINUTES';

function readIntegerEnv(key: IntegerEnv, fallback: number, min: number, max: number): number {
  const raw = process.env[key];

  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }

  const value = Number(raw);
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new Error(`Environment variable ${key} must be an integer between ${min} and ${max}, got "${raw}"`);
  }

  return value;
}

export interface Env {
  APPOINTMENTS_FILE: string;
  PORT: number;
  HOST: string;
  LOG_LEVEL: string;
  BUFFER_MINUTES: number;
  CORS_ORIGINS: string[];
}

export function getEnv(): Env {
  return {
    APPOINTMENTS_FILE: process.env.APPOINTMENTS_FILE || 'data/appointments.csv',
    PORT: readIntegerEnv('PORT', 3000, 1, 65535),
    HOST: process.env.HOST || '0.0.0.0',
    LOG_LEVEL: process.env.LOG_LEVEL || 'info',
    BUFFER_MINUTES: readIntegerEnv('BUFFER_MINUTES', BUFFER_LIMITS.DEFAULT, BUFFER_LIMITS.MIN, BUFFER_LIMITS.MAX),
    // Dev default matches the booking form's local dev server
    CORS_ORIGINS: process.env.CORS_ORIGINS
      ? process.env.CORS_ORIGINS.split(',').map((o) => o.trim()).filter(Boolean)
      : ['http://localhost:5173'],
  };
}
