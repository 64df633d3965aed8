import { BaseSchemaDocument, OverlayDocument, SchemaField } from '../../models/Schema';

function currency(key: string, label: string, extra: Partial<SchemaField> = {}): SchemaField {
  return { key, label, type: 'currency', default: 0, ...extra };
}

function careFields(tag: 'a' | 'b', person: 'A' | 'B', careType: string): SchemaField[] {
  return [
    { key: `care_type_${tag}`, label: 'Care type', type: 'enum', choices: ['none', 'in_home', 'assisted_living', 'memory_care'], default: careType, person },
    { key: `hours_per_day_${tag}`, label: 'Hours per day', type: 'integer', default: 4, min: 0, max: 24, person },
    { key: `days_per_week_${tag}`, label: 'Days per week', type: 'integer', default: 5, min: 0, max: 7, person },
    { key: `room_type_${tag}`, label: 'Room type', type: 'enum', choices: ['studio', 'one_bedroom'], default: 'studio', person },
    { key: `care_level_${tag}`, label: 'Care level', type: 'enum', choices: ['low', 'medium', 'high'], default: 'low', person },
    { key: `mobility_${tag}`, label: 'Mobility', type: 'enum', choices: ['independent', 'walker'], default: 'independent', person },
    { key: `chronic_${tag}`, label: 'Chronic conditions', type: 'enum', choices: ['none', 'some'], default: 'none', person },
  ];
}

const vaChoices = ['none', 'veteran_with_spouse', 'surviving_spouse'];

/**
 * Small but complete base schema. Rates are round numbers so expected
 * values can be worked out by hand.
 */
export const testBaseSchema: BaseSchemaDocument = {
  version: 'test-1',
  groups: [
    {
      name: 'household',
      step: 1,
      fields: [
        { key: 'include_person_b', label: 'Include partner', type: 'boolean', default: false },
        { key: 'name_a', label: 'Name', type: 'text', default: '', person: 'A' },
        { key: 'name_b', label: 'Partner name', type: 'text', default: '', person: 'B' },
        { key: 'location', label: 'Location', type: 'enum', choices: ['National', 'Metro'], default: 'National' },
        { key: 'home_plan', label: 'Home plan', type: 'enum', choices: ['keep', 'sell', 'hecm', 'heloc'], default: 'keep' },
      ],
    },
    {
      name: 'home_sale',
      step: 1,
      visibleWhen: { field: 'home_plan', equals: 'sell' },
      fields: [
        currency('home_sale_price', 'Sale price'),
        currency('home_mortgage_payoff', 'Mortgage payoff'),
        currency('home_selling_costs', 'Selling costs'),
        { key: 'home_sale_month', label: 'Sale month', type: 'integer', default: 0, min: 0, max: 360 },
      ],
    },
    { name: 'care_a', step: 2, fields: careFields('a', 'A', 'in_home') },
    {
      name: 'care_b',
      step: 2,
      visibleWhen: { field: 'include_person_b', equals: true },
      fields: careFields('b', 'B', 'none'),
    },
    {
      name: 'shared',
      step: 2,
      fields: [
        { key: 'share_one_unit', label: 'Share one unit', type: 'boolean', default: false },
        currency('home_mod_cost', 'Home modifications'),
        { key: 'home_mod_months', label: 'Spread over months', type: 'integer', default: 12, min: 1, max: 120 },
      ],
    },
    {
      name: 'income',
      step: 3,
      fields: [
        currency('ss_a', 'Social Security', { category: 'income', person: 'A' }),
        currency('pension_a', 'Pension', { category: 'income', person: 'A' }),
        currency('ss_b', 'Partner Social Security', { category: 'income', person: 'B' }),
        { key: 'va_category_a', label: 'VA category', type: 'enum', choices: vaChoices, default: 'none', person: 'A' },
        { key: 'va_category_b', label: 'Partner VA category', type: 'enum', choices: vaChoices, default: 'none', person: 'B' },
        { key: 'ltc_insurance_a', label: 'LTC insurance', type: 'boolean', default: false, person: 'A' },
      ],
    },
    {
      name: 'costs',
      step: 3,
      fields: [
        currency('mortgage', 'Mortgage', { category: 'home_expense' }),
        currency('medicare', 'Medicare', { category: 'expense' }),
        { key: 'discount_pct', label: 'Family discount', type: 'percent', default: 0 },
      ],
    },
    {
      name: 'assets',
      step: 3,
      fields: [
        currency('cash_savings', 'Cash', { category: 'asset' }),
        currency('ira_total', 'IRA', { category: 'asset' }),
      ],
    },
  ],
  lookups: {
    roomRates: { studio: 3000, one_bedroom: 4000 },
    inHomeHourlyRates: { '4': 30, '8': 26, '24': 20 },
    careLevelAdders: { low: 0, medium: 500, high: 1000 },
    chronicAdders: { none: 0, some: 100 },
    mobilityAdders: {
      facility: { independent: 0, walker: 200 },
      inHome: { independent: 0, walker: 2 },
    },
    locationMultipliers: { National: 1, Metro: 1.5 },
    vaCategories: { none: 0, veteran_with_spouse: 2000, surviving_spouse: 1000 },
  },
  settings: {
    memoryCareMultiplier: 1.25,
    secondPersonFee: 1000,
    ltcMonthlyBenefit: 1500,
    displayCapYears: 30,
    runwayHorizonMonths: 360,
    vaIncomeTested: false,
    defaultAmortizationMonths: 12,
  },
};

export const emptyOverlay: OverlayDocument = { directives: [] };

export const incomeOverlay: OverlayDocument = {
  version: 'overlay-1',
  directives: [
    {
      action: 'add-group',
      target: 'income_household',
      group: {
        name: 'income_household',
        step: 3,
        fields: [currency('rental_income', 'Rental income', { category: 'income' })],
      },
    },
    { action: 'append-field', target: 'assets', field: currency('ira_roth', 'Roth IRA', { category: 'asset' }) },
    { action: 'replace-field', target: 'assets', field: currency('ira_total', 'IRA total', { category: 'asset', step: 100 }) },
  ],
  lookups: { locationMultipliers: { National: 1, Metro: 2 } },
};

/**
 * Drops the bounds the test schema puts on care hours and amortization months
 */
export const unboundedOverlay: OverlayDocument = {
  directives: [
    {
      action: 'replace-field',
      target: 'care_a',
      field: { key: 'hours_per_day_a', label: 'Hours per day', type: 'integer', default: 4, person: 'A' },
    },
    {
      action: 'replace-field',
      target: 'shared',
      field: { key: 'home_mod_months', label: 'Spread over months', type: 'integer', default: 12 },
    },
  ],
};

/**
 * Defaults written as strings, the way a hand-edited schema file might
 */
export const stringDefaultsSchema = {
  groups: [
    {
      name: 'person',
      fields: [
        { key: 'hours_per_day_a', label: 'Hours per day', type: 'integer', default: '6' },
        { key: 'ltc_insurance_a', label: 'LTC insurance', type: 'boolean', default: 'yes' },
        { key: 'name_a', label: 'Name', type: 'text', default: ' Mom ' },
      ],
    },
  ],
};
