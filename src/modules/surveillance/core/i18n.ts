/**
 * Surveillance Module - i18n Translations
 *
 * Portuguese and English labels for the metrics summary text.
 */

import type { SupportedLanguage } from './types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Translation Keys
// ─────────────────────────────────────────────────────────────────────────────

export interface SummaryTranslations {
  /** Heading line, `{date}` is the latest notification date */
  heading: string;
  metrics: {
    caseVariation: string;
    deathRate: string;
    icuRate: string;
    vaccinationRate: string;
  };
  /** Rendered in place of an undefined rate */
  insufficientData: string;
  /** Daily and monthly chart captions */
  charts: {
    daily: string;
    monthly: string;
  };
  decimalSeparator: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Translations
// ─────────────────────────────────────────────────────────────────────────────

const pt: SummaryTranslations = {
  heading: 'Resumo das métricas de SRAG com dados até {date}:',
  metrics: {
    caseVariation: 'Variação de casos nos últimos {days} dias',
    deathRate: 'Taxa de mortalidade nos últimos {days} dias',
    icuRate: 'Taxa de ocupação de UTI nos últimos {days} dias',
    vaccinationRate: 'Taxa de vacinação nos últimos {days} dias',
  },
  insufficientData: 'dados insuficientes para o período',
  charts: {
    daily: 'Casos diários de SRAG nos últimos {days} dias',
    monthly: 'Casos mensais de SRAG nos últimos {months} meses',
  },
  decimalSeparator: ',',
};

const en: SummaryTranslations = {
  heading: 'SRAG metrics summary with data up to {date}:',
  metrics: {
    caseVariation: 'Case variation over the last {days} days',
    deathRate: 'Mortality rate over the last {days} days',
    icuRate: 'ICU occupancy rate over the last {days} days',
    vaccinationRate: 'Vaccination rate over the last {days} days',
  },
  insufficientData: 'insufficient data for this period',
  charts: {
    daily: 'Daily SRAG cases over the last {days} days',
    monthly: 'Monthly SRAG cases over the last {months} months',
  },
  decimalSeparator: '.',
};

const translations: Record<SupportedLanguage, SummaryTranslations> = { pt, en };

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

export const getTranslations = (lang: SupportedLanguage): SummaryTranslations => {
  return translations[lang];
};

/**
 * Interpolates `{name}` placeholders.
 */
export const interpolate = (
  template: string,
  variables: Record<string, string | number>
): string => {
  return Object.entries(variables).reduce((result, [key, value]) => {
    return result.replace(new RegExp(`\\{${key}\\}`, 'g'), String(value));
  }, template);
};

/**
 * `DD/MM/YYYY` for Portuguese, ISO for English.
 */
export const formatReportDate = (lang: SupportedLanguage, date: string): string => {
  if (lang === 'en') {
    return date;
  }
  const [year = '', month = '', day = ''] = date.split('-');
  return `${day}/${month}/${year}`;
};
