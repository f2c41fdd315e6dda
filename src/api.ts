/**
 * Public API shared by the Node and browser entry points. The entry points
 * differ only in the Flate implementation they install.
 */

export { isColored, isPatternColored, isShadingColored } from './detect/color-detector.js';
export { isMarked, isTextEmpty, operatorMarking, MARKING_OPERATORS } from './detect/marking-detector.js';
export type { OperatorMarking } from './detect/marking-detector.js';
export type { DetectOptions } from './detect/context.js';
export { toGrayscale, convertPatternToGray } from './transform/grayscale.js';
export type { GrayscaleOptions } from './transform/grayscale.js';
export { convertShadingToGray, RGB_TO_GRAY_PROGRAM, CMYK_TO_GRAY_PROGRAM } from './transform/shading.js';
export { convertImageToGray, convertInlineImageToGray } from './transform/image.js';
export { summarizePages, toMM } from './summary.js';
export type { PageInput, PageSummary, SummaryOptions } from './summary.js';

export { parseContentStream } from './content/parser.js';
export { serializeContentStream } from './content/writer.js';
export { op } from './content/operators.js';
export type { ContentOperator, ContentStream } from './content/operators.js';
export { processContentStream, applyColorOperator } from './content/processor.js';
export type { HandlerSet, OperatorHandler } from './content/processor.js';
export { defaultGraphicsState } from './content/graphics-state.js';
export type { GraphicsState } from './content/graphics-state.js';

export * from './color/color.js';
export * from './color/colorspace.js';
export { colorToRGB, colorToGray, rgbToGray, cmykToRGB, GRAY_WEIGHTS } from './color/convert.js';
export {
  COLOR_TOLERANCE, isColorColored, isColorVisible, isRGBColored, visibleAdditive, visibleSubtractive,
} from './color/predicates.js';

export { MemoryResourceScope } from './resources/memory-scope.js';
export type { MemoryResources } from './resources/memory-scope.js';
export { PdfResourceScope } from './resources/dict-scope.js';
export { parseColorspace, colorspaceToPdfObject } from './resources/colorspace-object.js';
export type {
  FormXObject, ImageXObject, Pattern, ResourceScope, Shading, ShadingPattern, TilingPattern, XObject,
} from './resources/types.js';

export { defaultImageCodec } from './image/codec.js';
export type { EncodedImage, EncodedImageData, EncodeRequest, ImageCodec } from './image/codec.js';
export type { RawImage } from './image/raster.js';

export { evaluateFunction, parseFunction } from './function/pdf-function.js';
export type { PdfFunction } from './function/pdf-function.js';

export { pdfArray, pdfDict, pdfName, pdfNumber, pdfRef, pdfStream, pdfString } from './parser/types.js';
export type { ObjectResolver, Operand, PdfDict, PdfInlineImage, PdfObject } from './parser/types.js';

export { setLogger, getLogger } from './logger.js';
export type { Logger } from './logger.js';

export {
  GraytoneError,
  PdfParseError,
  PdfUnsupportedError,
  PdfFunctionError,
  UndefinedResourceError,
  UndefinedColorspaceError,
  UndefinedPatternError,
  UndefinedShadingError,
  UndefinedXObjectError,
  UnsupportedColorspaceError,
  UnsupportedEncodingParametersError,
  UnknownColorTypeError,
} from './errors.js';
export type { ResourceType } from './errors.js';
