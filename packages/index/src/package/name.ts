const NAME_COMPONENT = /^[A-Za-z0-9]*[A-Za-z][A-Za-z0-9]*$/;

/**
 * Package names are `-`-separated alphanumeric components, each containing at
 * least one letter (so `foo-1.0` cannot be read as a name).
 */
export function isPackageName(text: string): boolean {
  return text.length > 0 && text.split('-').every((component) => NAME_COMPONENT.test(component));
}

export function parsePackageName(text: string): string | undefined {
  return isPackageName(text) ? text : undefined;
}
