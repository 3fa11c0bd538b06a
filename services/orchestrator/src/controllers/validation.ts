import { ValidationPipe, type Type } from "@nestjs/common";

/** Per-parameter pipe carrying its DTO type explicitly, so validation does not depend on emitted metadata. */
export const validated = <T>(expectedType: Type<T>) =>
  new ValidationPipe({ expectedType, whitelist: true, transform: true });
