export const STEPS = ['MENU', 'AWAITING_NAME', 'SELECT_DATE', 'SELECT_TIME', 'CONFIRM'] as const;

export type Step = (typeof STEPS)[number];

export const SERVICE_TYPES = ['appointment_1', 'appointment_2'] as const;

export type ServiceType = (typeof SERVICE_TYPES)[number];

/** Display index ("1".."N") → value offered at that index. */
export type IndexedChoices = Record<string, string>;

export interface CallerSession {
  step: Step;
  serviceType?: ServiceType;
  patientName?: string;
  /** "1".."N" → 'yyyy-MM-dd' */
  offeredDates?: IndexedChoices;
  /** "1".."N" → ISO start datetime */
  offeredTimes?: IndexedChoices;
  selectedDate?: string;
  selectedTime?: string;
}

/** Numeral shown to the caller → semantic option id (e.g. "1" → "date_1"). */
export type ButtonIndexMap = Record<string, string>;

export interface ConversationRecord {
  session: CallerSession;
  buttonMap?: ButtonIndexMap;
  updatedAt: string;
}

export interface OptionItem {
  id: string;
  label: string;
}

export type OutboundResponse =
  | { type: 'TEXT'; body: string }
  | { type: 'OPTIONS'; body: string; options: OptionItem[] };

export interface InboundMessage {
  callerId: string;
  text: string;
  structuredOptionId?: string;
  messageId: string;
}
