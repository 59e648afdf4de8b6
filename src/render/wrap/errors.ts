import { ValidationError } from "../../utils/errors.js";

export class InvalidWidthError extends ValidationError {
  public readonly width: number;

  constructor(width: number) {
    super(`Wrap width must be a non-negative integer (received ${width}).`);
    this.name = "InvalidWidthError";
    this.width = width;
  }
}
