import type { ProjectHub } from './realtime/projectHub';
import type { ProjectGate } from './services/gate';
import type { OutlineEngine } from './services/outlineEngine';
import type { OutlineStore } from './services/types';

export type Variables = {
  store: OutlineStore;
  gate: ProjectGate;
  outline: OutlineEngine;
  hub: ProjectHub;
  heartbeatMs: number;
};
