// ============================================
// GameElement
// Base class for rectangular entities in 2D arcade games
// ============================================

import { Rectangle } from '@pixi/math';
import { logElementCreated, logger } from './logger';
import type { GameElementOptions, GameElementSnapshot, Position, Size, Velocity } from './types';

/**
 * GameElement - one rectangular entity on screen.
 *
 * Position and size live in `rect`, a `Rectangle` owned by this element.
 * The element itself has no x/y/width/height; go through `rect`:
 *
 *   const ball = new GameElement(10, 20, 5, 5);
 *   ball.rect.x += 3;
 *
 * `rect` is never reassigned. To replace it wholesale, copy into it:
 * `element.rect.copyFrom(other)`.
 *
 * Drawing, updating and collision handling belong to subclasses.
 */
export class GameElement {
  readonly rect: Rectangle;

  // Pixels per millisecond, right and down positive
  velocity: Velocity;

  collidable: boolean;

  constructor(x: number, y: number, width: number, height: number, options: GameElementOptions = {}) {
    this.rect = new Rectangle(x, y, width, height);
    this.velocity = { ...(options.velocity ?? { x: 0, y: 0 }) };
    this.collidable = options.collidable ?? true;

    if (logger.isLevelEnabled('debug')) {
      logElementCreated(this.constructor.name, this.rect);
    }
  }

  /**
   * Create an element from an existing rectangle.
   * The rectangle's fields are copied; the element never shares it.
   * Called on a subclass, builds that subclass (its constructor must keep
   * the base signature).
   */
  static fromRect<T extends GameElement>(
    this: new (x: number, y: number, width: number, height: number, options?: GameElementOptions) => T,
    rect: Rectangle,
    options?: GameElementOptions
  ): T {
    return new this(rect.x, rect.y, rect.width, rect.height, options);
  }

  get position(): Position {
    return { x: this.rect.x, y: this.rect.y };
  }

  get size(): Size {
    return { width: this.rect.width, height: this.rect.height };
  }

  get center(): Position {
    return {
      x: this.rect.x + this.rect.width / 2,
      y: this.rect.y + this.rect.height / 2,
    };
  }

  toJSON(): GameElementSnapshot {
    return {
      ...this.position,
      ...this.size,
      velocity: { ...this.velocity },
      collidable: this.collidable,
    };
  }
}
