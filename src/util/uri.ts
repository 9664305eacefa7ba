import { URI } from "vscode-uri";

const SCHEME = /^([a-zA-Z][a-zA-Z0-9+.-]*):/;

export function uriScheme(uri: string): string {
  return SCHEME.exec(uri)?.[1]?.toLowerCase() ?? "";
}

// Scheme-less values are taken to be paths already.
export function uriToPath(uri: string): string {
  if (uri === "" || uriScheme(uri) === "") return uri;
  return URI.parse(uri).fsPath;
}

export function pathToUri(fsPath: string): string {
  return URI.file(fsPath).toString();
}
