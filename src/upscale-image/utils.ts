import { UpscaleError } from '../common/errors';

export function validateScale(scale: number): void {
  if (!Number.isInteger(scale) || scale < 2) {
    throw new UpscaleError(`Invalid scale: ${scale}. Must be an integer of at least 2.`);
  }
}
