// Entities
export * from './entities/Media';

// Interfaces
export * from './interfaces/IMediaResolver';

// Value Objects
export * from './value-objects/PostUrl';
