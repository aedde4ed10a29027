/**
 * Read a text field from submitted form data. Missing fields and file
 * uploads read as "".
 */
export function formString(formData: FormData, name: string): string {
  const value = formData.get(name);
  return typeof value === "string" ? value : "";
}
