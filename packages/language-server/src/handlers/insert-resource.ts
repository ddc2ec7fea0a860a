/**
 * textDocument/insertResource: materialize a live cloud resource as a declaration
 * at the caret.
 *
 * Silent stops (no edit, no error): unknown document, unparsable id, unknown
 * type, no payload, cancellation. Everything else is logged and reported to the
 * client as a generic request failure.
 */
import {
  CancellationToken,
  LSPErrorCodes,
  ResponseError,
  type Position,
  type TextDocumentIdentifier,
} from "vscode-languageserver/node.js";
import {
  createEditDescriptor,
  createTrace,
  debug,
  matchResourceType,
  NormalizationError,
  NormalizationErrorCode,
  NOOP_TRACE,
  offsetAtPosition,
  parseResourceId,
  PipelineAttributes,
  synthesizeResourceInsertion,
  type TraceExporter,
} from "@resource-ls/compiler";
import type { ServerContext } from "../context.js";
import { mapWorkspaceEdit } from "../mapping/lsp-types.js";

export const INSERT_RESOURCE_METHOD = "textDocument/insertResource";

export interface InsertResourceParams {
  textDocument: TextDocumentIdentifier;
  position: Position;
  resourceId?: string | null;
}

export interface InsertResourceOptions {
  /** Receives one trace per request; without it requests run untraced. */
  traceExporter?: TraceExporter | undefined;
}

export async function handleInsertResource(
  ctx: ServerContext,
  params: InsertResourceParams,
  token: CancellationToken = CancellationToken.None,
  options: InsertResourceOptions = {},
): Promise<null> {
  const uri = params.textDocument.uri;
  const trace = options.traceExporter
    ? createTrace({ name: "insertResource", exporter: options.traceExporter })
    : NOOP_TRACE;
  trace.setAttribute(PipelineAttributes.DOCUMENT_URI, uri);
  try {
    const context = ctx.compilations.getCompilation(uri);
    if (!context) return stop("no-compilation", uri);

    const identifier = parseResourceId(params.resourceId);
    if (!identifier) return stop("invalid-resource-id", uri);

    const descriptor = matchResourceType(ctx.types.availableTypes(), identifier.fullyQualifiedType);
    if (!descriptor) return stop("unknown-type", uri);
    trace.setAttributes({
      [PipelineAttributes.RESOURCE_TYPE]: descriptor.fullyQualifiedType,
      [PipelineAttributes.API_VERSION]: descriptor.apiVersion,
    });

    const body = await trace.spanAsync("resource.fetch", () =>
      ctx.fetcher.fetch({ identifier, descriptor, cancellation: token }),
    );
    if (!body) return stop("no-payload", uri);
    if (token.isCancellationRequested) return stop("cancelled", uri);

    const offset = offsetAtPosition(context.lineStarts, params.position, context.compilation.sourceFile.text);
    const replacement = synthesizeResourceInsertion({
      identifier,
      descriptor,
      body,
      compilation: context.compilation,
      offset,
      printOptions: context.configuration.formatting,
      cancellation: token,
      trace,
    });
    if (token.isCancellationRequested) return stop("cancelled", uri);

    const edit = createEditDescriptor(uri, replacement, context.lineStarts);
    const result = await ctx.connection.workspace.applyEdit({ label: "Insert resource", edit: mapWorkspaceEdit(edit) });
    if (!result.applied) {
      throw new Error(`Client did not apply the edit${result.failureReason ? `: ${result.failureReason}` : ""}`);
    }
    ctx.logger.info(`insertResource: ${identifier.fullyQualifiedType}@${descriptor.apiVersion} inserted into ${uri}`);
    return null;
  } catch (e: unknown) {
    if (e instanceof NormalizationError && e.code === NormalizationErrorCode.CANCELLED) {
      return stop("cancelled", uri);
    }
    const message = e instanceof Error ? e.stack ?? e.message : String(e);
    ctx.logger.error(`insertResource failed: ${message}`);
    throw new ResponseError(LSPErrorCodes.RequestFailed, "Failed to insert the resource");
  } finally {
    trace.rootSpan().end();
  }
}

function stop(reason: string, uri: string): null {
  debug.server("insertResource.stop", { reason, uri });
  return null;
}

/**
 * Registers the insert-resource request on the connection.
 */
export function registerInsertResourceHandlers(ctx: ServerContext, options: InsertResourceOptions = {}): void {
  ctx.connection.onRequest(INSERT_RESOURCE_METHOD, (params: InsertResourceParams, token: CancellationToken) =>
    handleInsertResource(ctx, params, token, options),
  );
}
