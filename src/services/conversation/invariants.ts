import type { CallerSession, IndexedChoices, Step } from './state.types.js';

/** Steps reachable from each step, besides staying put. */
export const TRANSITIONS: Readonly<Record<Step, readonly Step[]>> = {
  MENU: ['AWAITING_NAME'],
  AWAITING_NAME: ['SELECT_DATE', 'MENU'],
  SELECT_DATE: ['SELECT_TIME', 'MENU'],
  SELECT_TIME: ['CONFIRM', 'MENU'],
  CONFIRM: ['MENU'],
};

export function isAllowedTransition(from: Step, to: Step): boolean {
  return from === to || TRANSITIONS[from].includes(to);
}

function hasContiguousKeys(choices: IndexedChoices | undefined): boolean {
  if (!choices) return true;
  const keys = Object.keys(choices);
  if (keys.length > 3) return false;
  return keys.every((k, i) => k === String(i + 1));
}

export function assertInvariants(session: CallerSession): string[] {
  const issues: string[] = [];
  if (!hasContiguousKeys(session.offeredDates)) issues.push('offeredDates_not_contiguous');
  if (!hasContiguousKeys(session.offeredTimes)) issues.push('offeredTimes_not_contiguous');

  if (session.step !== 'MENU' && !session.serviceType) {
    issues.push('serviceType_required');
  }
  if ((session.step === 'SELECT_DATE' || session.step === 'SELECT_TIME') && !session.patientName) {
    issues.push('patientName_required');
  }
  if (session.step === 'SELECT_TIME' && !session.selectedDate) {
    issues.push('selectedDate_required');
  }
  if (session.step === 'CONFIRM') {
    if (!session.patientName) issues.push('patientName_required');
    if (!session.selectedDate) issues.push('selectedDate_required');
    if (!session.selectedTime) issues.push('selectedTime_required');
  }
  return issues;
}
