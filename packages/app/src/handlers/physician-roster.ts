import { readFileSync } from 'node:fs';
import type { Message } from '@agent-mesh/core';
import { dataPart, extractText, isRecord, textPart } from '@agent-mesh/core';
import type { CapabilityHandler, HandlerResult } from '@agent-mesh/agent-runtime';
import { HandlerError } from '@agent-mesh/agent-runtime';
import { hasKeyword } from './text-fields.js';

export interface Physician {
  id: string;
  name: string;
  specialty: string;
  department: string;
}

export interface PhysicianRosterOptions {
  /** Days of slots offered, starting tomorrow. Default: 7. */
  days?: number;
  /** Whole hours offered each day. Default: 9-11 and 14-16. */
  hours?: readonly number[];
  clock?: () => Date;
}

export const ROSTER_HELP =
  'I can help you find physicians by specialty or check their availability. Please specify what you need.';

const DEFAULT_HOURS: readonly number[] = [9, 10, 11, 14, 15, 16];
const NEXT_SLOTS = 3;
const DAY_MS = 24 * 60 * 60 * 1000;

/** Read and check the physician list from a JSON file. */
export function loadRoster(filePath: string): Physician[] {
  const parsed: unknown = JSON.parse(readFileSync(filePath, 'utf-8'));
  if (!Array.isArray(parsed)) {
    throw new Error(`Roster ${filePath} must be a JSON array`);
  }
  return parsed.map((entry: unknown, index) => {
    if (
      !isRecord(entry) ||
      typeof entry['id'] !== 'string' ||
      typeof entry['name'] !== 'string' ||
      typeof entry['specialty'] !== 'string' ||
      typeof entry['department'] !== 'string'
    ) {
      throw new Error(`Roster ${filePath}[${index}] needs string id, name, specialty and department`);
    }
    return { id: entry['id'], name: entry['name'], specialty: entry['specialty'], department: entry['department'] };
  });
}

/** Hourly slots as `YYYY-MM-DDTHH:00:00` (UTC), one block per day starting the day after `from`. */
export function generateSlots(from: Date, days = 7, hours: readonly number[] = DEFAULT_HOURS): string[] {
  const slots: string[] = [];
  for (let d = 1; d <= days; d++) {
    const date = new Date(from.getTime() + d * DAY_MS).toISOString().slice(0, 10);
    for (const hour of hours) {
      slots.push(`${date}T${String(hour).padStart(2, '0')}:00:00`);
    }
  }
  return slots;
}

/** Lowercased stems a request may use for a specialty ("cardiolog" matches cardiology and cardiologist). */
function specialtyStems(specialty: string): string[] {
  const lower = specialty.toLowerCase();
  const first = lower.split(/\s+/)[0] ?? lower;
  return [lower, first.replace(/(y|s)$/, '')];
}

/** Searches the roster by specialty and reports upcoming slots. */
export class PhysicianRosterHandler implements CapabilityHandler {
  private readonly days: number;
  private readonly hours: readonly number[];
  private readonly clock: () => Date;

  constructor(
    private readonly physicians: readonly Physician[],
    options: PhysicianRosterOptions = {},
  ) {
    this.days = options.days ?? 7;
    this.hours = options.hours ?? DEFAULT_HOURS;
    this.clock = options.clock ?? (() => new Date());
  }

  async handle(message: Message): Promise<HandlerResult> {
    const text = extractText(message);
    if (hasKeyword(text, ['find', 'search'])) return this.search(text);
    if (hasKeyword(text, ['available', 'availability'])) return this.availability(text);
    return { parts: [textPart(ROSTER_HELP)] };
  }

  /** Physicians whose specialty the text mentions; everyone when it names none. */
  select(text: string): Physician[] {
    const lower = text.toLowerCase();
    const matched = this.physicians.filter((p) => specialtyStems(p.specialty).some((stem) => lower.includes(stem)));
    return matched.length > 0 ? matched : [...this.physicians];
  }

  private search(text: string): HandlerResult {
    const physicians = this.select(text);
    if (physicians.length === 0) {
      throw new HandlerError('No physicians found matching your criteria.');
    }
    const slotCount = this.days * this.hours.length;
    const lines = physicians.map((p) => `${p.name} (${p.specialty})`);
    return {
      parts: [
        textPart([`Found ${physicians.length} physicians matching your criteria:`, ...lines].join('\n')),
        dataPart({
          physicians: physicians.map((p) => ({ ...p, availableSlots: slotCount })),
        }),
      ],
    };
  }

  private availability(text: string): HandlerResult {
    const physicians = this.select(text);
    const next = generateSlots(this.clock(), this.days, this.hours).slice(0, NEXT_SLOTS);
    return {
      parts: [
        textPart("Here's the current availability:"),
        dataPart({
          availability: physicians.map((p) => ({
            physicianId: p.id,
            physicianName: p.name,
            specialty: p.specialty,
            nextAvailableSlots: next,
          })),
        }),
      ],
    };
  }
}
