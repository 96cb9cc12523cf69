export * from "./errors";
export * from "./generator";
export * from "./inspect";
export * from "./jupyterlab-client";
export { formatTemplate, templateFields } from "./template";
export { createUsecase, exampleTemplate, EXAMPLE_PARAMS } from "./usecase";
