import clipboardy from "clipboardy"

export interface ClipboardWriter {
  write(text: string): Promise<void>
}

export const systemClipboard: ClipboardWriter = {
  write: (text) => clipboardy.write(text),
}
