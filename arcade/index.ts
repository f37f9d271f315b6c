// ============================================
// arcade-tools
// Helpers shared by small 2D arcade games
// ============================================

// Entity base class
export * from './GameElement';

// Type definitions (Position, Size, Velocity, options)
export * from './types';

// Structured logging (pino)
export * from './logger';
