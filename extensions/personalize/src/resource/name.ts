/**
 * Resource name case conversions.
 */

export function camelToSnake(name: string): string {
  return name.replace(/[A-Z]/g, (c) => `_${c.toLowerCase()}`).replace(/^_/, "");
}

export function camelToDash(name: string): string {
  return name.replace(/[A-Z]/g, (c) => `-${c.toLowerCase()}`).replace(/^-/, "");
}

export function snakeToCamel(name: string): string {
  const [first, ...rest] = name.split("_");
  return first + rest.map((part) => part.charAt(0).toUpperCase() + part.slice(1).toLowerCase()).join("");
}

export function camelToPascal(name: string): string {
  return name.charAt(0).toUpperCase() + name.slice(1);
}

/**
 * `dataset-import-job` -> `Dataset Import Job`
 */
export function dashToTitle(name: string): string {
  return name
    .split("-")
    .map((part) => part.charAt(0).toUpperCase() + part.slice(1))
    .join(" ");
}

/**
 * A validated camelCased resource name with its derived spellings.
 */
export class ResourceName {
  readonly camel: string;

  constructor(name: string) {
    if (!/^[A-Za-z]+$/.test(name)) {
      throw new Error("name must be camelCased");
    }
    if (name.charAt(0) !== name.charAt(0).toLowerCase()) {
      throw new Error("name must start with a lower case character");
    }
    this.camel = name;
  }

  get dash(): string {
    return camelToDash(this.camel);
  }

  get snake(): string {
    return camelToSnake(this.camel);
  }

  get pascal(): string {
    return camelToPascal(this.camel);
  }

  toString(): string {
    return this.camel;
  }
}
