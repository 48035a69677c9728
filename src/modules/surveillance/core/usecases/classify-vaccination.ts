import type { FinalClassification, VaccinationLabel, YesNoUnknown } from '../types.js';

const labelFrom = (vaccinated: boolean): VaccinationLabel =>
  vaccinated ? 'vaccinated' : 'not_vaccinated';

/**
 * Classifies the vaccination status of one case.
 *
 * - influenza: only the flu vaccine answer counts
 * - covid19: only the COVID-19 vaccine answer counts
 * - any other classification: vaccinated only when both answers are `yes`
 *
 * An `unknown` answer is read as not vaccinated, so the rule never returns
 * `unknown` today.
 */
export const classifyVaccination = (
  classification: FinalClassification,
  fluVaccine: YesNoUnknown,
  covidVaccine: YesNoUnknown
): VaccinationLabel => {
  switch (classification) {
    case 'influenza':
      return labelFrom(fluVaccine === 'yes');

    case 'covid19':
      return labelFrom(covidVaccine === 'yes');

    case 'other_virus':
    case 'other_agent':
    case 'unspecified':
    case 'unknown':
      return labelFrom(fluVaccine === 'yes' && covidVaccine === 'yes');
  }
};
