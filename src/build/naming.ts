import type { PropertyDescriptor, PropertyNameStyle } from '../model/descriptors';

export const DEFAULT_CLASS_PREFIXES: readonly string[] = ['Abstract', 'Base'];

/**
 * `getEmailAddress` -> `emailAddress`, `isActive` -> `active`.
 * Returns undefined when the name is not getter-shaped (`get`/`is` followed by an upper-case letter).
 */
export function propertyNameFromGetter(methodName: string): string | undefined {
  for (const prefix of ['get', 'is']) {
    if (!methodName.startsWith(prefix) || methodName.length <= prefix.length) continue;
    const first = methodName.charAt(prefix.length);
    if (first !== first.toUpperCase() || first === first.toLowerCase()) continue;
    return first.toLowerCase() + methodName.slice(prefix.length + 1);
  }
  return undefined;
}

/** `AbstractPerson` -> `Person`. Only strips when something is left after the prefix. */
export function removeClassPrefixes(simpleName: string, prefixes: readonly string[] = DEFAULT_CLASS_PREFIXES): string {
  for (const prefix of prefixes) {
    if (simpleName.startsWith(prefix) && simpleName.length > prefix.length) {
      return simpleName.slice(prefix.length);
    }
  }
  return simpleName;
}

export function capitalize(name: string): string {
  return name.length === 0 ? name : name.charAt(0).toUpperCase() + name.slice(1);
}

/** `emailAddress` -> `EMAIL_ADDRESS`, `homeURL` -> `HOME_URL`. */
export function upperCaseUnderscore(name: string): string {
  return name
    .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
    .replace(/([A-Z])([A-Z][a-z])/g, '$1_$2')
    .toUpperCase();
}

const IDENTIFIER = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

export function isValidIdentifier(name: string): boolean {
  return IDENTIFIER.test(name);
}

export function isBooleanProperty(p: PropertyDescriptor): boolean {
  return p.type.kind === 'PRIMITIVE' && p.type.name === 'boolean';
}

export function getterName(p: PropertyDescriptor, style: PropertyNameStyle = 'BEAN'): string {
  switch (style) {
    case 'FLUENT':
    case 'NONE':
      return p.name;
    case 'BEAN':
    case 'FLUENT_BEAN':
    default:
      return `${isBooleanProperty(p) ? 'is' : 'get'}${capitalize(p.name)}`;
  }
}

export function setterName(p: PropertyDescriptor, style: PropertyNameStyle = 'BEAN'): string {
  switch (style) {
    case 'FLUENT':
    case 'NONE':
      return p.name;
    case 'BEAN':
    case 'FLUENT_BEAN':
    default:
      return `set${capitalize(p.name)}`;
  }
}

/** Name of the generated property-state field, e.g. `$emailAddress_state`. */
export function propertyStateFieldName(p: PropertyDescriptor): string {
  return `$${p.name}_state`;
}
