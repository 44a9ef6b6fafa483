import { Application } from 'express';
import { createApp } from '../../src/app';
import { authService } from '../../src/auth/auth.service';
import { createTestSystem, TestSystem, TestSystemOptions } from './testSystem';

export interface TestApp {
  app: Application;
  system: TestSystem;
}

export const createTestApp = (options: TestSystemOptions = {}): TestApp => {
  const system = createTestSystem(options);
  const app = createApp(system, { faucetEnabled: true });
  return { app, system };
};

export const bearer = (principal: string): string => `Bearer ${authService.issueToken(principal).accessToken}`;
