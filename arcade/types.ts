// ============================================
// Shared Types & Interfaces
// Geometry and option shapes used by GameElement
// ============================================

// Top-left corner of an element, in screen pixels
// (0, 0) is the top left of the game screen; negatives are off-screen
export interface Position {
  x: number;
  y: number;
}

export interface Size {
  width: number;
  height: number;
}

// Velocity vector (pixels per millisecond)
// Same shape as Position; positive x is right, positive y is down
export interface Velocity {
  x: number;
  y: number;
}

// Optional settings for a new GameElement
export interface GameElementOptions {
  velocity?: Velocity;
  // false for backgrounds and anything other elements pass through
  collidable?: boolean;
}

// Plain-object form of a GameElement (what toJSON returns)
export interface GameElementSnapshot extends Position, Size {
  velocity: Velocity;
  collidable: boolean;
}
