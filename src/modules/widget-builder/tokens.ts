export const WIDGET_BUILDER_TOKENS = {
  WidgetIdentity: Symbol("WidgetIdentity"),
  PayloadVariant: Symbol("PayloadVariant"),
  WidgetBuilderService: Symbol("WidgetBuilderService"),
};
