export enum Industry {
  TECHNOLOGY = 'Technology',
  HEALTHCARE = 'Healthcare',
  FINANCE = 'Finance',
  MANUFACTURING = 'Manufacturing',
  RETAIL = 'Retail',
  EDUCATION = 'Education',
  REAL_ESTATE = 'Real Estate',
  CONSULTING = 'Consulting',
  MEDIA_ENTERTAINMENT = 'Media & Entertainment',
  TRANSPORTATION = 'Transportation',
  HOSPITALITY = 'Hospitality',
  ENERGY = 'Energy',
  TELECOMMUNICATIONS = 'Telecommunications',
  CONSTRUCTION = 'Construction',
  AGRICULTURE = 'Agriculture',
  OTHER = 'Other',
}

export const INDUSTRIES: readonly Industry[] = Object.values(Industry);
