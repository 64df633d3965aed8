import { getField } from '../../models/Schema';
import { InputState } from '../../state/inputState';
import { categoryAmounts, homePlan, includedPersons, isCounted, personName } from '../../state/selectors';
import { resolvedTestSchema, stateWith } from '../fixtures/states';

describe('selectors', () => {
  it('should include only person A by default', () => {
    expect(includedPersons(stateWith())).toEqual(['A']);
    expect(includedPersons(stateWith({ include_person_b: true }))).toEqual(['A', 'B']);
  });

  it('should fall back to a generic name', () => {
    expect(personName(stateWith(), 'A')).toBe('Person A');
    expect(personName(stateWith({ name_b: 'Sam' }), 'B')).toBe('Sam');
  });

  it('should read the home plan', () => {
    expect(homePlan(stateWith())).toBe('keep');
    expect(homePlan(stateWith({ home_plan: 'heloc' }))).toBe('heloc');
  });

  it('should not count partner fields without a partner', () => {
    const field = getField(resolvedTestSchema(), 'ss_b');
    expect(field).not.toBeNull();
    if (field) {
      expect(isCounted(stateWith({ ss_b: 900 }), field)).toBe(false);
      expect(isCounted(stateWith({ ss_b: 900, include_person_b: true }), field)).toBe(true);
    }
  });

  it('should collect counted amounts by category', () => {
    const state = stateWith({ ss_a: 1500, pension_a: 400, ss_b: 900 });
    expect(categoryAmounts(state, 'income')).toEqual({ ss_a: 1500, pension_a: 400 });
  });

  it('should skip fields in hidden groups', () => {
    const schema = resolvedTestSchema();
    const costs = schema.groups.find((g) => g.name === 'costs');
    if (costs) {
      costs.visibleWhen = { field: 'home_plan', equals: 'keep' };
    }
    const state = InputState.fromSchema(schema);
    state.setMany({ medicare: 150, mortgage: 1200 });
    expect(categoryAmounts(state, 'expense')).toEqual({ medicare: 150 });
    state.set('home_plan', 'sell');
    expect(categoryAmounts(state, 'expense')).toEqual({});
  });
});
