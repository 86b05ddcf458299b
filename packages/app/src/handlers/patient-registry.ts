import type { Message } from '@agent-mesh/core';
import { dataPart, extractText, now, textPart } from '@agent-mesh/core';
import type { CapabilityHandler, HandlerResult } from '@agent-mesh/agent-runtime';
import { HandlerError } from '@agent-mesh/agent-runtime';
import { findEmail, findMrn, hasKeyword, readFields, sequenceId } from './text-fields.js';

export interface PatientRecord {
  mrn: string;
  name: string;
  email: string;
  phone: string;
  registeredAt: string;
}

export type AuditAction = 'access' | 'registration' | 'lookup';

/** One access to the registry; `recordId` is null until a record is involved. */
export interface AuditEntry {
  timestamp: string;
  action: AuditAction;
  recordId: string | null;
  contextId: string | null;
}

export const PATIENT_HELP =
  "I can help you with patient registration and lookup. Please specify what you'd like to do.";

const REGISTRATION_FIELDS = ['name', 'email', 'phone'] as const;

/**
 * Registers patients and looks them up by email or medical record number.
 * Records live in memory for the lifetime of the process.
 */
export class PatientRegistryHandler implements CapabilityHandler {
  private readonly records = new Map<string, PatientRecord>();
  private readonly byEmail = new Map<string, string>();
  private readonly audit: AuditEntry[] = [];

  async handle(message: Message): Promise<HandlerResult> {
    const text = extractText(message);
    const contextId = message.contextId ?? null;
    this.logAccess('access', null, contextId);
    if (hasKeyword(text, ['register'])) return this.register(text, contextId);
    if (hasKeyword(text, ['lookup', 'look up', 'find'])) return this.lookup(text, contextId);
    return { parts: [textPart(PATIENT_HELP)] };
  }

  get size(): number {
    return this.records.size;
  }

  /** Every access so far, oldest first. */
  get auditTrail(): readonly AuditEntry[] {
    return this.audit.map((entry) => ({ ...entry }));
  }

  private logAccess(action: AuditAction, recordId: string | null, contextId: string | null): void {
    this.audit.push({ timestamp: now(), action, recordId, contextId });
  }

  private register(text: string, contextId: string | null): HandlerResult {
    const fields = readFields(text, REGISTRATION_FIELDS);
    const { name, phone } = fields;
    const email = fields['email'] !== undefined ? findEmail(fields['email']) : undefined;
    if (!name || !email || !phone) {
      const given = { name, email, phone };
      const missing = REGISTRATION_FIELDS.filter((f) => !given[f]);
      throw new HandlerError('Please provide patient name, email, and phone number for registration.', [
        dataPart({ missing }),
      ]);
    }

    const existing = this.byEmail.get(email);
    if (existing !== undefined) {
      throw new HandlerError(`A patient with email ${email} is already registered as ${existing}.`);
    }

    const record: PatientRecord = {
      mrn: sequenceId('MR', this.records.size + 1),
      name,
      email,
      phone,
      registeredAt: now(),
    };
    this.records.set(record.mrn, record);
    this.byEmail.set(email, record.mrn);
    this.logAccess('registration', record.mrn, contextId);

    return { parts: [textPart('Patient registered successfully!'), dataPart({ ...record })] };
  }

  private lookup(text: string, contextId: string | null): HandlerResult {
    const mrn = findMrn(text);
    const email = findEmail(text);
    if (mrn === undefined && email === undefined) {
      throw new HandlerError('Please provide either an email address or medical record number for lookup.');
    }

    const key = mrn ?? (email !== undefined ? this.byEmail.get(email) : undefined);
    const record = key !== undefined ? this.records.get(key) : undefined;
    if (!record) {
      throw new HandlerError('Patient not found in our records.');
    }
    this.logAccess('lookup', record.mrn, contextId);
    return { parts: [textPart('Patient found!'), dataPart({ ...record })] };
  }
}
