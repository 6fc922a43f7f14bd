import { DateTime } from 'luxon';

import type { OptionItem, ServiceType } from './state.types.js';

const WEEKDAYS = ['Segunda', 'Terça', 'Quarta', 'Quinta', 'Sexta', 'Sábado', 'Domingo'] as const;
const MONTHS = [
  'Jan', 'Fev', 'Mar', 'Abr', 'Mai', 'Jun', 'Jul', 'Ago', 'Set', 'Out', 'Nov', 'Dez',
] as const;

export const SERVICE_NAMES: Record<ServiceType, string> = {
  appointment_1: 'Consulta Geral',
  appointment_2: 'Consulta Especializada',
};

export const OFFICE_HOURS_ID = 'office_hours';
export const CONFIRM_YES_ID = 'confirm_yes';
export const CONFIRM_NO_ID = 'confirm_no';

export const MENU_OPTIONS: readonly OptionItem[] = [
  { id: 'appointment_1', label: SERVICE_NAMES.appointment_1 },
  { id: 'appointment_2', label: SERVICE_NAMES.appointment_2 },
  { id: OFFICE_HOURS_ID, label: 'Horário de Atendimento' },
];

export const CONFIRM_OPTIONS: readonly OptionItem[] = [
  { id: CONFIRM_YES_ID, label: 'Sim, confirmar' },
  { id: CONFIRM_NO_ID, label: 'Cancelar' },
];

/** "Terça, 4 Jun" */
export function formatDate(dayISO: string, tz: string): string {
  const dt = DateTime.fromISO(dayISO, { zone: tz });
  return `${WEEKDAYS[dt.weekday - 1]}, ${dt.day} ${MONTHS[dt.month - 1]}`;
}

/** "09:30" */
export function formatTime(iso: string, tz: string): string {
  return DateTime.fromISO(iso, { setZone: true }).setZone(tz).toFormat('HH:mm');
}

const pad = (hour: number) => `${String(hour).padStart(2, '0')}:00`;

export interface SummaryFields {
  patientName: string;
  serviceName: string;
  dateLabel: string;
  timeLabel: string;
}

function summaryLines(f: SummaryFields): string {
  return [
    `👤 Paciente: ${f.patientName}`,
    `🏥 Serviço: ${f.serviceName}`,
    `📅 Data: ${f.dateLabel}`,
    `⏰ Horário: ${f.timeLabel}`,
  ].join('\n');
}

export const messages = {
  menu: (clinicName: string) => `Olá! Bem-vindo à ${clinicName} 🏥\n\nQual serviço deseja agendar?`,

  officeHours: (startHour: number, endHour: number, slotMinutes: number) =>
    [
      '📅 Horário de Atendimento:',
      '',
      `Segunda a Sexta: ${pad(startHour)} - ${pad(endHour)}`,
      'Sábado: Fechado',
      'Domingo: Fechado',
      '',
      `⏰ Duração da consulta: ${slotMinutes} minutos`,
      '',
      "Digite 'menu' para voltar ao menu principal.",
    ].join('\n'),

  invalidOption: () => "Por favor, escolha uma opção válida ou digite 'menu'.",

  askName: () =>
    'Perfeito! Para continuar, preciso de algumas informações.\n\nQual é o seu nome completo?',

  askNameAgain: () => 'Por favor, informe o seu nome completo.',

  chooseDate: (patientName: string) => `Obrigado, ${patientName}!\n\nEscolha uma data disponível:`,

  noDates: (phone: string) =>
    `Desculpe, não há datas disponíveis no momento. Entre em contato pelo telefone ${phone}.\n\nDigite "menu" para voltar.`,

  invalidDate: () => 'Por favor, escolha uma data válida ou digite "menu" para voltar.',

  chooseTime: (dateLabel: string) => `Data selecionada: ${dateLabel}\n\nEscolha um horário:`,

  noTimes: () =>
    'Desculpe, não há horários disponíveis nesta data. Digite "menu" para escolher outra data.',

  invalidTime: () => 'Por favor, escolha um horário válido ou digite "menu" para voltar.',

  summary: (f: SummaryFields) =>
    `📋 Resumo do Agendamento:\n\n${summaryLines(f)}\n\nDeseja confirmar este agendamento?`,

  bookingConfirmed: (f: SummaryFields) =>
    `✅ Agendamento Confirmado!\n\n${summaryLines(f)}\n\nVocê receberá um lembrete antes da consulta.\n\nDigite "menu" para fazer um novo agendamento.`,

  bookingFailed: (phone: string) =>
    `Desculpe, não foi possível concluir o agendamento. Responda 1 para tentar novamente ou entre em contato pelo telefone ${phone}.\n\nDigite "menu" para voltar.`,

  slotTaken: () =>
    'Desculpe, este horário acabou de ser ocupado. Digite "menu" para escolher outro horário.',

  cancelled: () => 'Agendamento cancelado. Digite "menu" para começar novamente.',

  fallback: () => "Desculpe, não entendi. Digite 'menu' para voltar ao menu principal.",

  genericError: () => 'Desculpe, algo deu errado. Digite "menu" para tentar novamente.',

  optionsHint: () => 'Responda com o número da opção.',
} as const;
