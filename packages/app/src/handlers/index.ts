import type { AgentEntry, Logger } from '@agent-mesh/core';
import type { CapabilityHandler } from '@agent-mesh/agent-runtime';
import type { DownstreamInvoker } from '@agent-mesh/orchestrator';
import { createCoordinatorHandler } from '@agent-mesh/orchestrator';
import { AppointmentBookHandler } from './appointment-book.js';
import { createMedicalAnalysisHandler } from './medical-analysis.js';
import { PatientRegistryHandler } from './patient-registry.js';
import { PhysicianRosterHandler, loadRoster } from './physician-roster.js';

export interface HandlerDeps {
  entry: AgentEntry;
  logger: Logger;
  /** Downstream calls for coordinator agents. */
  invoker: DownstreamInvoker;
  /** Per-step budget for coordinator steps without their own timeout. */
  stepTimeoutMs: number;
  rosterPath: string;
  clock?: () => Date;
}

export type HandlerFactory = (deps: HandlerDeps) => CapabilityHandler;

/** Handler implementations selectable through `handler` in an agent entry. */
export const HANDLER_FACTORIES: Readonly<Record<string, HandlerFactory>> = {
  'patient-registry': () => new PatientRegistryHandler(),
  'physician-roster': ({ rosterPath, clock }) =>
    new PhysicianRosterHandler(loadRoster(rosterPath), clock ? { clock } : {}),
  'appointment-book': () => new AppointmentBookHandler(),
  'medical-analysis': ({ entry }) =>
    createMedicalAnalysisHandler({
      ...(entry.stages ? { stages: entry.stages } : {}),
      ...(entry.stageDelayMs !== undefined ? { stageDelayMs: entry.stageDelayMs } : {}),
    }),
  coordinator: ({ entry, invoker, stepTimeoutMs, logger }) =>
    createCoordinatorHandler({
      steps: entry.pipeline ?? [],
      invoker,
      defaultTimeoutMs: stepTimeoutMs,
      logger,
    }),
};

export function createHandler(deps: HandlerDeps): CapabilityHandler {
  const factory = HANDLER_FACTORIES[deps.entry.handler];
  if (!factory) {
    throw new Error(
      `Unknown handler "${deps.entry.handler}" (known: ${Object.keys(HANDLER_FACTORIES).join(', ')})`,
    );
  }
  return factory(deps);
}

export { PatientRegistryHandler, PATIENT_HELP } from './patient-registry.js';
export type { PatientRecord } from './patient-registry.js';
export { PhysicianRosterHandler, loadRoster, generateSlots, ROSTER_HELP } from './physician-roster.js';
export type { Physician, PhysicianRosterOptions } from './physician-roster.js';
export { AppointmentBookHandler, APPOINTMENT_HELP } from './appointment-book.js';
export type { Appointment, AppointmentStatus } from './appointment-book.js';
export { createMedicalAnalysisHandler, assessRisk, ANALYSIS_STAGES } from './medical-analysis.js';
export type { MedicalAnalysisOptions, RiskLevel } from './medical-analysis.js';
