/**
 * Thrown when a host lacks one of the attributes every parameter path is built from.
 */
export class MissingRequiredAttributeError extends Error {
  readonly missingAttributes: string[];

  constructor(missingAttributes: string[]) {
    super(
      `Host is missing required attribute(s) for parameter lookup: ${missingAttributes.join(', ')}`,
    );
    this.name = 'MissingRequiredAttributeError';
    this.missingAttributes = missingAttributes;
  }
}
