import { toJsonText } from "@/lib/files";

/**
 * Trigger a browser download of a JSON document.
 */
export function downloadJson(fileName: string, data: unknown): void {
  const blob = new Blob([toJsonText(data)], { type: "application/json" });
  const url = URL.createObjectURL(blob);

  const a = document.createElement("a");
  a.href = url;
  a.download = fileName;
  document.body.appendChild(a);
  a.click();
  a.remove();

  URL.revokeObjectURL(url);
}

export async function readJsonFile(file: File): Promise<unknown> {
  const text = await file.text();
  return JSON.parse(text);
}
