import type { ErrorOptions } from "evlog";
import type { ImageErrorCode } from "./codes.ts";
import { VmtopoError } from "./base.ts";

export class ImageNotFoundError extends VmtopoError {
  readonly machine: string;
  readonly image: string;

  constructor(code: ImageErrorCode, options: ErrorOptions & { machine: string; image: string }) {
    super(code, options);
    this.name = "ImageNotFoundError";
    this.machine = options.machine;
    this.image = options.image;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), machine: this.machine, image: this.image };
  }
}

export const imageNotFoundError = (
  machine: string,
  image: string,
  location?: string,
): ImageNotFoundError =>
  new ImageNotFoundError("ERR_IMAGE_NOT_FOUND", {
    machine,
    image,
    message: `Base image ${image} for machine "${machine}" is not available`,
    ...(location !== undefined && { fix: `Place the exported appliance at ${location}.` }),
  });
