import { Category } from './types.js';

export interface ClassifyRecipientInput {
  /** Award type and indicator fields joined by a single space */
  descriptors: string;
  recipientName: string;
  /** Full state name, e.g. "New York" */
  stateName: string;
}

/**
 * Public universities are often recorded without the "State" indicator,
 * particularly in older fiscal years, so the recipient name is checked too.
 */
const isStateUniversity = (descriptors: string, recipientName: string, stateName: string): boolean => {
  if (descriptors.includes('State')) {
    return true;
  }

  const name = recipientName.toUpperCase();
  const state = stateName.toUpperCase();

  return (
    name.includes(`UNIVERSITY OF ${state}`) ||
    name.includes(`${state} STATE`) ||
    name.includes(`UNIV ${state}`)
  );
};

/**
 * Maps the indicator text of a contract action to the recipient categories it
 * counts towards. Substring tests are case-sensitive.
 */
export const classifyRecipient = (input: ClassifyRecipientInput): ReadonlySet<Category> => {
  const { descriptors, recipientName, stateName } = input;
  const categories = new Set<Category>();

  if (
    (descriptors.includes('Small Business') || descriptors.includes('Small Disadvantaged Business')) &&
    !descriptors.includes('Other Than Small Business')
  ) {
    categories.add(Category.SMALL_BUSINESS);
  }

  if (descriptors.includes('Woman Owned') || descriptors.includes('Women Owned')) {
    categories.add(Category.WOMAN_OWNED);
  }

  if (descriptors.includes('Minority Owned')) {
    categories.add(Category.MINORITY_OWNED);
  }

  const educational = descriptors.includes('Educational');
  if (educational) {
    categories.add(Category.EDUCATIONAL);

    if (isStateUniversity(descriptors, recipientName, stateName)) {
      categories.add(Category.STATE_UNIVERSITY);
    }

    if (descriptors.includes('Historically Black')) {
      categories.add(Category.HBCU);
    }
  }

  if (
    descriptors.includes('Nonprofit Organization') &&
    !descriptors.includes('University') &&
    !descriptors.includes('State')
  ) {
    categories.add(Category.NON_PROFIT);
  }

  if (descriptors.includes('Grant For Research')) {
    categories.add(Category.GRANT);
  }

  return categories;
};
