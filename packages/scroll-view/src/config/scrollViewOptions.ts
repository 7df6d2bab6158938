import { z } from "zod";
import { ScrollViewConfigurationError } from "../errors";
import { horizontalAxisDirection, verticalAxisDirection } from "../geometry/axisDirection";
import type { Axis, ClipBehavior, HorizontalAxisDirection, TextDirection, VerticalAxisDirection } from "../geometry/types";
import type { DiagonalDragBehavior, DragStartBehavior } from "../gestures/diagonalDrag";
import type { ScrollViewKeyboardDismissBehavior } from "../gestures/keyboardDismiss";
import { resolveEdgeInsets, type EdgeInsets, type EdgeInsetsGeometry } from "../layout/EdgeInsets";
import type { ScrollController } from "../viewport/ScrollController";
import { DEFAULT_SCROLL_PHYSICS, type ScrollPhysics } from "../viewport/ScrollPhysics";

const insetSchema = z.number().finite().nonnegative();

export const EdgeInsetsSchema = z.object({
  left: insetSchema,
  top: insetSchema,
  right: insetSchema,
  bottom: insetSchema
});

export const EdgeInsetsDirectionalSchema = z.object({
  start: insetSchema,
  top: insetSchema,
  end: insetSchema,
  bottom: insetSchema
});

export const ClipBehaviorSchema = z.enum(["none", "hardEdge", "antiAlias", "antiAliasWithSaveLayer"]);
export const DiagonalDragBehaviorSchema = z.enum(["none", "weightedEvent", "weightedContinuous", "free"]);
export const DragStartBehaviorSchema = z.enum(["start", "down"]);
export const KeyboardDismissBehaviorSchema = z.enum(["manual", "onDrag"]);

/**
 * Plain-data scroll view settings. Object-valued options (controllers, physics) are checked
 * separately in {@link resolveScrollViewOptions}.
 */
export const ScrollViewSettingsSchema = z.object({
  padding: z.union([EdgeInsetsSchema, EdgeInsetsDirectionalSchema]).nullish(),
  reverseVertical: z.boolean().default(false),
  reverseHorizontal: z.boolean().default(false),
  textDirection: z.enum(["ltr", "rtl"]).default("ltr"),
  primary: z.boolean().optional(),
  mainAxis: z.enum(["horizontal", "vertical"]).default("vertical"),
  clipBehavior: ClipBehaviorSchema.default("hardEdge"),
  diagonalDragBehavior: DiagonalDragBehaviorSchema.default("none"),
  dragStartBehavior: DragStartBehaviorSchema.default("start"),
  keyboardDismissBehavior: KeyboardDismissBehaviorSchema.default("manual")
});

export interface ScrollViewOptions {
  /** The amount of space by which to inset the child. */
  padding?: EdgeInsetsGeometry | null;
  /**
   * Whether the vertical axis scrolls against the reading direction (bottom to top).
   *
   * Defaults to false.
   */
  reverseVertical?: boolean;
  /**
   * Whether the horizontal axis scrolls against the reading direction. For ltr text a reversed
   * horizontal axis scrolls from right to left.
   *
   * Defaults to false.
   */
  reverseHorizontal?: boolean;
  textDirection?: TextDirection;
  /**
   * Whether the main axis uses the ambient controller from `PrimaryScrollController`.
   *
   * Must not be true when a controller is passed for the main axis.
   */
  primary?: boolean;
  /** The axis `primary` applies to. Defaults to vertical. */
  mainAxis?: Axis;
  verticalController?: ScrollController | null;
  horizontalController?: ScrollController | null;
  /** How the vertical axis responds to user input. Defaults to clamping physics. */
  verticalPhysics?: ScrollPhysics | null;
  /** How the horizontal axis responds to user input. Defaults to clamping physics. */
  horizontalPhysics?: ScrollPhysics | null;
  /** Defaults to `hardEdge`. */
  clipBehavior?: ClipBehavior;
  /** Defaults to `none`: a drag moves only one axis. */
  diagonalDragBehavior?: DiagonalDragBehavior;
  dragStartBehavior?: DragStartBehavior;
  keyboardDismissBehavior?: ScrollViewKeyboardDismissBehavior;
}

export interface AxisConfiguration<D> {
  axisDirection: D;
  controller: ScrollController | null;
  physics: ScrollPhysics;
}

export interface ResolvedScrollViewOptions {
  padding: EdgeInsets;
  textDirection: TextDirection;
  mainAxis: Axis;
  horizontal: AxisConfiguration<HorizontalAxisDirection>;
  vertical: AxisConfiguration<VerticalAxisDirection>;
  clipBehavior: ClipBehavior;
  diagonalDragBehavior: DiagonalDragBehavior;
  dragStartBehavior: DragStartBehavior;
  keyboardDismissBehavior: ScrollViewKeyboardDismissBehavior;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}

/**
 * Validates scroll view options and fills in defaults.
 *
 * `primaryController` is the ambient controller provided by `PrimaryScrollController`, if any.
 * Throws {@link ScrollViewConfigurationError} for invalid values and for `primary: true`
 * combined with an explicit main-axis controller.
 */
export function resolveScrollViewOptions(
  options: ScrollViewOptions,
  primaryController: ScrollController | null = null
): ResolvedScrollViewOptions {
  const parsed = ScrollViewSettingsSchema.safeParse({
    padding: options.padding,
    reverseVertical: options.reverseVertical,
    reverseHorizontal: options.reverseHorizontal,
    textDirection: options.textDirection,
    primary: options.primary,
    mainAxis: options.mainAxis,
    clipBehavior: options.clipBehavior,
    diagonalDragBehavior: options.diagonalDragBehavior,
    dragStartBehavior: options.dragStartBehavior,
    keyboardDismissBehavior: options.keyboardDismissBehavior
  });
  if (!parsed.success) {
    throw new ScrollViewConfigurationError(`Invalid scroll view options: ${formatIssues(parsed.error)}`);
  }
  const settings = parsed.data;

  const mainAxisController =
    settings.mainAxis === "vertical" ? (options.verticalController ?? null) : (options.horizontalController ?? null);

  if (settings.primary === true && mainAxisController) {
    throw new ScrollViewConfigurationError(
      `Primary scroll views obtain their ${settings.mainAxis} controller from PrimaryScrollController. ` +
        `You cannot both set primary to true and pass an explicit ${settings.mainAxis}Controller.`
    );
  }

  const usePrimary = settings.primary ?? mainAxisController === null;
  const effectiveMainController = usePrimary ? primaryController : mainAxisController;

  const verticalController =
    settings.mainAxis === "vertical" ? effectiveMainController : (options.verticalController ?? null);
  const horizontalController =
    settings.mainAxis === "horizontal" ? effectiveMainController : (options.horizontalController ?? null);

  return {
    padding: resolveEdgeInsets(settings.padding, settings.textDirection),
    textDirection: settings.textDirection,
    mainAxis: settings.mainAxis,
    horizontal: {
      axisDirection: horizontalAxisDirection(settings.textDirection, settings.reverseHorizontal),
      controller: horizontalController,
      physics: options.horizontalPhysics ?? DEFAULT_SCROLL_PHYSICS
    },
    vertical: {
      axisDirection: verticalAxisDirection(settings.reverseVertical),
      controller: verticalController,
      physics: options.verticalPhysics ?? DEFAULT_SCROLL_PHYSICS
    },
    clipBehavior: settings.clipBehavior,
    diagonalDragBehavior: settings.diagonalDragBehavior,
    dragStartBehavior: settings.dragStartBehavior,
    keyboardDismissBehavior: settings.keyboardDismissBehavior
  };
}
