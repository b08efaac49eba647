const IS_PROD = typeof process !== 'undefined' && process.env?.NODE_ENV === 'production';

const join = (lines: string[]): string => lines.join('\n');
const format = (prod: string, devLines: string[]): string => (IS_PROD ? prod : join(devLines));

/**
 * A class map already exists for the type. Maps are never replaced in place:
 * derived maps may already hold a resolved reference to the existing one.
 */
export class DuplicateRegistrationError extends Error {
  constructor(
    public typeName: string,
    public registryName: string
  ) {
    const dev = [
      `Duplicate class map registration for '${typeName}'`,
      '',
      `Registry '${registryName}' already holds a class map for '${typeName}'.`,
      'Registered class maps cannot be replaced, because derived class maps may',
      'already reference the existing one as their base.',
      '',
      'To fix this:',
      `  1. Register the class map for '${typeName}' once, before its first lookup`,
      `  2. Or customize it inside registerClassMap(${typeName}, (cm) => { ... })`,
      `     instead of calling lookupClassMap() first`,
    ];
    super(format(`Class map for '${typeName}' is already registered.`, dev));
    this.name = 'DuplicateRegistrationError';
  }
}

export class AmbiguousDiscriminatorError extends Error {
  constructor(
    public discriminator: string,
    public nominalType: string,
    public candidates: string[]
  ) {
    const dev = [
      `Ambiguous discriminator '${discriminator}'`,
      '',
      `More than one type registered under '${discriminator}' is assignable to '${nominalType}':`,
      ...candidates.map((c) => `  - ${c}`),
      '',
      'To fix this:',
      `  1. Give each type its own discriminator with @Discriminator('...')`,
      `  2. Or decode with a narrower nominal type than '${nominalType}'`,
    ];
    super(format(`Ambiguous discriminator: ${discriminator}`, dev));
    this.name = 'AmbiguousDiscriminatorError';
  }
}

export class UnknownDiscriminatorError extends Error {
  constructor(
    public discriminator: string,
    public nominalType: string
  ) {
    const dev = [
      `Unknown discriminator value '${discriminator}'`,
      '',
      `No registered type uses '${discriminator}', and it does not name a known type.`,
      `Expected type: ${nominalType}`,
      '',
      'To fix this:',
      `  1. List the concrete type in @KnownTypes(...) on '${nominalType}'`,
      `  2. Or look up its class map before decoding`,
    ];
    super(format(`Unknown discriminator value: ${discriminator}`, dev));
    this.name = 'UnknownDiscriminatorError';
  }
}

export class TypeMismatchError extends Error {
  constructor(
    public actualType: string,
    public nominalType: string
  ) {
    const dev = [
      'Discriminated type mismatch',
      '',
      `Actual type '${actualType}' is not assignable to expected type '${nominalType}'.`,
    ];
    super(format(`Actual type ${actualType} is not assignable to expected type ${nominalType}.`, dev));
    this.name = 'TypeMismatchError';
  }
}

export class InvalidPropertySelectorError extends Error {
  constructor(
    public reason: string,
    cause?: unknown
  ) {
    const dev = [
      'Invalid property selector',
      '',
      reason,
      '',
      'Valid selectors:',
      `  - a member name: 'email'`,
      `  - a direct member access: (u) => u.email`,
      `  - one primitive conversion of it: (u) => String(u.email)`,
    ];
    super(format(`Invalid property selector: ${reason}`, dev), cause === undefined ? undefined : { cause });
    this.name = 'InvalidPropertySelectorError';
  }
}

export class UnknownMemberError extends Error {
  constructor(
    public typeName: string,
    public memberName: string
  ) {
    const dev = [
      'Unknown member',
      '',
      `'${memberName}' is not a data member of '${typeName}'.`,
    ];
    super(format(`'${memberName}' is not a member of '${typeName}'.`, dev));
    this.name = 'UnknownMemberError';
  }
}

export class InvalidClassTypeError extends Error {
  constructor(public value: unknown) {
    let valueString: string;
    try {
      valueString = typeof value === 'function' ? `function ${value.name || '<anonymous>'}` : String(value);
    } catch {
      valueString = typeof value;
    }

    const dev = [
      'Invalid class type',
      '',
      'Expected a class constructor or a type created with closeGeneric().',
      '',
      'Received:',
      `  ${valueString}`,
    ];
    super(format('Invalid class type.', dev));
    this.name = 'InvalidClassTypeError';
  }
}

export class InvalidRegistryConfigError extends Error {
  constructor(public reason: string) {
    const dev = ['Invalid registry configuration', '', `Invalid registry configuration: ${reason}`];
    super(format(`Invalid registry configuration: ${reason}`, dev));
    this.name = 'InvalidRegistryConfigError';
  }
}
