/**
 * Call-site location and rewriting
 * Finds the assertion call behind a captured location and builds its replacement text
 */

import { CallExpression, Node, Project, SourceFile, SyntaxKind } from "ts-morph";
import { CallSiteNotFoundError } from "./errors";
import { hashText, leadingWhitespace } from "./utils";

export const DEFAULT_CALLEE_NAMES: readonly string[] = ["autoAssert"];

export interface CallSite {
  file: string;
  line: number;
  /** Offsets of the whole call expression within the file text */
  start: number;
  end: number;
  text: string;
  calleeText: string;
  valueText: string;
  /** Indentation of the line the call starts on */
  indent: string;
}

export class CallSiteRewriter {
  private project = new Project({
    useInMemoryFileSystem: true,
    compilerOptions: { allowJs: true },
  });
  private parsed = new Map<string, { fingerprint: string; sourceFile: SourceFile }>();

  constructor(private readonly calleeNames: readonly string[] = DEFAULT_CALLEE_NAMES) {}

  getCalleeNames(): readonly string[] {
    return this.calleeNames;
  }

  /**
   * Locate the assertion call at `line` (1-based) of `text`. When several calls
   * share the line, `column` (1-based, as stack frames report it) picks the one
   * whose callee name starts there.
   */
  locate(file: string, text: string, line: number, column?: number): CallSite {
    const sourceFile = this.parse(file, text);
    const calls = sourceFile
      .getDescendantsOfKind(SyntaxKind.CallExpression)
      .filter((call) => this.isAssertionCall(call));

    const exact = calls.filter((call) => calleePosition(sourceFile, call).line === line);
    const atColumn = exact.find((call) => calleePosition(sourceFile, call).column === column);
    const spanning = calls.filter(
      (call) => call.getStartLineNumber() <= line && line <= call.getEndLineNumber()
    );
    // descendants come outer-first, so the last spanning call is the innermost
    const call = atColumn ?? exact[0] ?? spanning[spanning.length - 1];
    if (!call) {
      throw new CallSiteNotFoundError(file, line, this.calleeNames);
    }

    const value = call.getArguments()[0];
    if (!value) {
      throw new CallSiteNotFoundError(file, line, this.calleeNames);
    }

    const startLine = call.getStartLineNumber();
    const lineText = sourceFile.getFullText().split(/\r?\n/)[startLine - 1] ?? "";

    return {
      file,
      line,
      start: call.getStart(),
      end: call.getEnd(),
      text: call.getText(),
      calleeText: call.getExpression().getText(),
      valueText: value.getText(),
      indent: leadingWhitespace(lineText),
    };
  }

  /**
   * Replacement call text recording `pattern` as the expected value
   */
  replacement(site: CallSite, pattern: string, eol: string = "\n"): string {
    // template literal lines are part of the value and keep their indentation
    const indent = pattern.startsWith("`") ? "" : site.indent;
    const body = pattern
      .split("\n")
      .map((line, index) => (index === 0 ? line : indent + line))
      .join(eol);
    return `${site.calleeText}(${site.valueText}, ${body})`;
  }

  private isAssertionCall(call: CallExpression): boolean {
    return this.calleeNames.includes(calleeName(call).getText());
  }

  private parse(file: string, text: string): SourceFile {
    const fingerprint = hashText(text);
    const cached = this.parsed.get(file);
    if (cached && cached.fingerprint === fingerprint) {
      return cached.sourceFile;
    }

    const sourceFile = this.project.createSourceFile(file, text, { overwrite: true });
    this.parsed.set(file, { fingerprint, sourceFile });
    return sourceFile;
  }
}

function calleeName(call: CallExpression): Node {
  const expression = call.getExpression();
  return Node.isPropertyAccessExpression(expression) ? expression.getNameNode() : expression;
}

function calleePosition(sourceFile: SourceFile, call: CallExpression): { line: number; column: number } {
  return sourceFile.getLineAndColumnAtPos(calleeName(call).getStart());
}
