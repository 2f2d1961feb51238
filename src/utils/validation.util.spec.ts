import { Type } from 'class-transformer';
import { IsDate, IsInt, IsString, ValidateNested } from 'class-validator';
import { toValidatedInstance, toValidatedInstances } from './validation.util';

class InnerFixture {
  @IsInt()
  count!: number;
}

class OuterFixture {
  @IsString()
  name!: string;

  @Type(() => Date)
  @IsDate()
  at!: Date;

  @ValidateNested()
  @Type(() => InnerFixture)
  inner!: InnerFixture;
}

describe('validation.util', () => {
  const valid = { name: 'a', at: '2024-05-01T18:00:00.000Z', inner: { count: 2 } };

  it('should convert nested values and dates', () => {
    const result = toValidatedInstance(OuterFixture, valid);

    expect(result).toBeInstanceOf(OuterFixture);
    expect(result.at).toEqual(new Date('2024-05-01T18:00:00.000Z'));
    expect(result.inner).toBeInstanceOf(InnerFixture);
  });

  it('should list nested failures with their path', () => {
    expect(() => toValidatedInstance(OuterFixture, { ...valid, inner: { count: 'x' } })).toThrow(
      'Invalid OuterFixture - inner.count: count must be an integer number',
    );
  });

  it('should reject non-objects', () => {
    expect(() => toValidatedInstance(OuterFixture, [valid])).toThrow('Expected a JSON object for OuterFixture');
    expect(() => toValidatedInstances(OuterFixture, valid)).toThrow('Expected a JSON array of OuterFixture');
  });

  it('should fail the whole array on a single invalid item', () => {
    expect(() => toValidatedInstances(OuterFixture, [valid, { ...valid, at: 'not a date' }])).toThrow(
      'Invalid OuterFixture - at: at must be a Date instance',
    );
  });
});
