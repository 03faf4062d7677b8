import {
  BadRequestException,
  InternalServerErrorException,
  NotFoundException,
  UnauthorizedException,
} from '@nestjs/common';
import { conflict, internal, invalid, notFound, ok, unauthorized } from '../service-result';
import { respond } from './respond';

describe('respond', () => {
  test('ok => value', () => {
    expect(respond(ok({ id: 1 }))).toEqual({ id: 1 });
  });

  test('not_found => 404', () => {
    expect(() => respond(notFound('Goal with ID 3 not found'))).toThrow(
      new NotFoundException('Goal with ID 3 not found'),
    );
  });

  test('conflict and invalid => 400 with the message', () => {
    expect(() => respond(conflict('code', 'Currency with code USD already exists'))).toThrow(BadRequestException);
    expect(() => respond(invalid('currentAmount must be between 0 and 1000'))).toThrow(
      'currentAmount must be between 0 and 1000',
    );
  });

  test('unauthorized => 401', () => {
    expect(() => respond(unauthorized('Invalid email or password'))).toThrow(UnauthorizedException);
  });

  test('internal => 500', () => {
    expect(() => respond(internal('Error creating goal'))).toThrow(InternalServerErrorException);
  });
});
