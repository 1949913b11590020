/**
 * Value of a `--name=value` argument
 * @returns The value, or undefined if the flag is absent or empty
 */
export const findArgValue = (
  args: string[],
  name: string
): string | undefined => {
  const prefix = `--${name}=`;
  const arg = args.find((a) => a.startsWith(prefix));
  if (!arg) return undefined;

  const value = arg.slice(prefix.length);
  if (!value) {
    console.warn(`Empty ${name} value provided. Ignoring --${name}.`);
    return undefined;
  }
  return value;
};
