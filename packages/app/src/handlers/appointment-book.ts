import type { Message } from '@agent-mesh/core';
import { dataPart, extractText, now, textPart } from '@agent-mesh/core';
import type { CapabilityHandler, HandlerResult } from '@agent-mesh/agent-runtime';
import { HandlerError } from '@agent-mesh/agent-runtime';
import { findAppointmentId, findEmail, findMrn, hasKeyword, sequenceId } from './text-fields.js';

export type AppointmentStatus = 'scheduled' | 'cancelled';

export interface Appointment {
  id: string;
  /** Medical record number or email. */
  patient: string;
  physician?: string;
  /** `YYYY-MM-DDTHH:MM:00`. */
  slot?: string;
  status: AppointmentStatus;
  request: string;
  createdAt: string;
}

export const APPOINTMENT_HELP =
  'I can help you book, view, or cancel appointments. Please specify what you need.';

const PHYSICIAN_PATTERN = /\bDr\.?\s+[A-Z][a-z]+(?:\s+[A-Z][a-z]+)?/;
const DATE_PATTERN = /\b(\d{4}-\d{2}-\d{2})(?:[T\s]+(?:at\s+)?(\d{1,2}):(\d{2}))?/;

function findSlot(text: string): string | undefined {
  const match = DATE_PATTERN.exec(text);
  if (!match) return undefined;
  const [, date, hour = '9', minute = '00'] = match;
  return `${date}T${hour.padStart(2, '0')}:${minute}:00`;
}

/** Books, lists and cancels appointments held in memory. */
export class AppointmentBookHandler implements CapabilityHandler {
  private readonly appointments = new Map<string, Appointment>();

  async handle(message: Message): Promise<HandlerResult> {
    const text = extractText(message);
    if (hasKeyword(text, ['cancel'])) return this.cancel(text);
    if (hasKeyword(text, ['book', 'schedule'])) return this.book(text);
    if (hasKeyword(text, ['view', 'list'])) return this.view(text);
    return { parts: [textPart(APPOINTMENT_HELP)] };
  }

  private book(text: string): HandlerResult {
    const patient = findMrn(text) ?? findEmail(text);
    if (patient === undefined) {
      throw new HandlerError('Please identify the patient by medical record number or email to book an appointment.');
    }

    const physician = PHYSICIAN_PATTERN.exec(text)?.[0];
    const slot = findSlot(text);
    const appointment: Appointment = {
      id: sequenceId('APT', this.appointments.size + 1),
      patient,
      ...(physician !== undefined ? { physician } : {}),
      ...(slot !== undefined ? { slot } : {}),
      status: 'scheduled',
      request: text,
      createdAt: now(),
    };
    this.appointments.set(appointment.id, appointment);

    return {
      parts: [textPart(`Appointment ${appointment.id} booked successfully!`), dataPart({ ...appointment })],
    };
  }

  private view(text: string): HandlerResult {
    const patient = findMrn(text) ?? findEmail(text);
    const appointments = [...this.appointments.values()].filter(
      (a) => patient === undefined || a.patient === patient,
    );
    return {
      parts: [textPart(`Found ${appointments.length} appointments:`), dataPart({ appointments })],
    };
  }

  private cancel(text: string): HandlerResult {
    const id = findAppointmentId(text);
    const appointment = id !== undefined ? this.appointments.get(id) : undefined;
    if (!appointment) {
      throw new HandlerError('Please provide a valid appointment ID to cancel.');
    }
    if (appointment.status === 'cancelled') {
      throw new HandlerError(`Appointment ${appointment.id} is already cancelled.`);
    }

    const cancelled: Appointment = { ...appointment, status: 'cancelled' };
    this.appointments.set(cancelled.id, cancelled);
    return {
      parts: [textPart(`Appointment ${cancelled.id} has been cancelled.`), dataPart({ ...cancelled })],
    };
  }
}
