import type { ClassType, IdGenerator, MemberShape, ValueType } from '../types/types.js';
import { UNORDERED } from './constants.js';

/**
 * How one member of a class maps to one document element.
 *
 * Created by {@link ClassMap} (auto-mapping or `mapProperty`); the encoder and
 * decoder only read it. Setters return `this` for chaining inside a
 * `registerClassMap` initializer.
 */
export class PropertyMap {
  private _elementName: string;
  private _order = UNORDERED;
  private _idGenerator?: IdGenerator;
  private _hasDefaultValue = false;
  private _defaultValue: unknown = undefined;
  private _serializeDefaultValue = true;
  private _ignoreIfNull = false;
  private _isRequired = false;
  private _useCompactRepresentation = false;

  constructor(
    readonly member: MemberShape,
    readonly declaringType: ClassType,
    elementName: string
  ) {
    this._elementName = elementName;
  }

  get propertyName(): string {
    return this.member.name;
  }

  get valueType(): ValueType | undefined {
    return this.member.valueType;
  }

  get elementName(): string {
    return this._elementName;
  }

  get order(): number {
    return this._order;
  }

  get hasExplicitOrder(): boolean {
    return this._order !== UNORDERED;
  }

  get idGenerator(): IdGenerator | undefined {
    return this._idGenerator;
  }

  get hasDefaultValue(): boolean {
    return this._hasDefaultValue;
  }

  get defaultValue(): unknown {
    return this._defaultValue;
  }

  get serializeDefaultValue(): boolean {
    return this._serializeDefaultValue;
  }

  get ignoreIfNull(): boolean {
    return this._ignoreIfNull;
  }

  get isRequired(): boolean {
    return this._isRequired;
  }

  get useCompactRepresentation(): boolean {
    return this._useCompactRepresentation;
  }

  setElementName(elementName: string): this {
    this._elementName = elementName;
    return this;
  }

  setOrder(order: number): this {
    if (!Number.isInteger(order)) throw new RangeError(`Order of '${this.propertyName}' must be an integer, got ${order}`);
    this._order = order;
    return this;
  }

  setIdGenerator(idGenerator: IdGenerator | undefined): this {
    this._idGenerator = idGenerator;
    return this;
  }

  setDefaultValue(defaultValue: unknown): this {
    this._defaultValue = defaultValue;
    this._hasDefaultValue = true;
    return this;
  }

  setSerializeDefaultValue(serializeDefaultValue: boolean): this {
    this._serializeDefaultValue = serializeDefaultValue;
    return this;
  }

  setIgnoreIfNull(ignoreIfNull: boolean): this {
    this._ignoreIfNull = ignoreIfNull;
    return this;
  }

  setIsRequired(isRequired: boolean): this {
    this._isRequired = isRequired;
    return this;
  }

  setUseCompactRepresentation(useCompactRepresentation: boolean): this {
    this._useCompactRepresentation = useCompactRepresentation;
    return this;
  }

  /**
   * Read the member from an instance of the declaring type.
   */
  getValue(instance: object): unknown {
    return Reflect.get(instance, this.member.name);
  }

  /**
   * Write the member on an instance of the declaring type. Read-only members
   * of anonymous types are defined as own properties instead.
   */
  setValue(instance: object, value: unknown): void {
    if (this.member.canWrite) {
      Reflect.set(instance, this.member.name, value);
      return;
    }
    Object.defineProperty(instance, this.member.name, {
      value,
      enumerable: true,
      configurable: true,
      writable: false,
    });
  }
}
