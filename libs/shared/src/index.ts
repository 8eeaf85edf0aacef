// Constants
export * from './domain/common/geo.constants';

// Errors
export * from './domain/errors/domain.errors';

// Value Objects
export * from './domain/value-objects/coordinate.vo';

// Domain Entities
export * from './domain/entities/hotel.entity';

// Repositories
export * from './domain/repositories/hotel.repository';

// Pagination
export * from './common/pagination';

// DTOs
export * from './dtos/hotel.dto';
