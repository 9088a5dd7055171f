export type Substitutions = {
  fileName: string;
  previewFileName: string;
  componentNamePascalCase: string;
};

/**
 * Upper-cases the first character only; the rest is left as is,
 * so "file_input" becomes "File_input", not "FileInput".
 */
export function capitalizeFirstLetter(name: string): string {
  if (name.length === 0) return name;
  return name.charAt(0).toUpperCase() + name.slice(1);
}

export function deriveSubstitutions(
  name: string,
  extension: string
): Substitutions {
  return {
    fileName: `${name}_page${extension}`,
    previewFileName: `${name}_preview${extension}`,
    componentNamePascalCase: capitalizeFirstLetter(name),
  };
}
