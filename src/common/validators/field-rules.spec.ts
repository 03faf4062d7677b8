import { plainToInstance } from 'class-transformer';
import { validate } from 'class-validator';
import { CreateBudgetDto } from '../../modules/budgets/dto/create-budget.dto';
import { UpdateGoalDto } from '../../modules/goals/dto/update-goal.dto';
import { UpdateUserDto } from '../../modules/users/dto/update-user.dto';
import { MAX_AMOUNT } from './field-rules';

async function failedProperties<T extends object>(cls: new () => T, body: object): Promise<string[]> {
  const errors = await validate(plainToInstance(cls, body));
  return errors.map((e) => e.property);
}

describe('IsOmittable', () => {
  test('absent fields are skipped', async () => {
    expect(await failedProperties(UpdateGoalDto, {})).toEqual([]);
  });

  test('null is rejected on non-nullable fields', async () => {
    expect(await failedProperties(UpdateGoalDto, { name: null })).toEqual(['name']);
    expect(await failedProperties(UpdateGoalDto, { targetAmount: null })).toEqual(['targetAmount']);
    expect(await failedProperties(UpdateUserDto, { username: null })).toEqual(['username']);
  });

  test('null clears nullable fields', async () => {
    expect(await failedProperties(UpdateGoalDto, { description: null })).toEqual([]);
    expect(await failedProperties(UpdateUserDto, { avatar: null })).toEqual([]);
  });
});

describe('MAX_AMOUNT', () => {
  const budget = { userId: 1, categoryId: 1, startDate: '2024-01-01', endDate: '2024-01-31' };

  test('the largest decimal(10,2) value is accepted', async () => {
    expect(await failedProperties(CreateBudgetDto, { ...budget, amount: MAX_AMOUNT })).toEqual([]);
  });

  test('anything above it is rejected before persistence', async () => {
    const errors = await validate(plainToInstance(CreateBudgetDto, { ...budget, amount: 100_000_000 }));

    expect(errors).toHaveLength(1);
    expect(errors[0].constraints).toEqual({ max: 'amount must not be greater than 99999999.99' });
  });
});
