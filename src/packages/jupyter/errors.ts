// Errors raised while generating or inspecting notebooks.

export class ParametersCellMissingError extends Error {
  constructor(tag: string) {
    super(`no cell with '${tag}' tag found in the notebook`);
    this.name = "ParametersCellMissingError";
  }
}

export class EmptyParametersCellError extends Error {
  constructor(tag: string) {
    super(`'${tag}' cell found with no content in the notebook`);
    this.name = "EmptyParametersCellError";
  }
}

export class DuplicateParametersCellError extends Error {
  count: number;
  constructor(tag: string, count: number) {
    super(`${count} cells tagged '${tag}' found in the notebook, expected one`);
    this.name = "DuplicateParametersCellError";
    this.count = count;
  }
}

export class UnresolvedParameterError extends Error {
  parameter: string;
  constructor(parameter: string) {
    super(`parameter '${parameter}' is used in the template but has no value`);
    this.name = "UnresolvedParameterError";
    this.parameter = parameter;
  }
}

export class TemplateSyntaxError extends Error {
  position: number;
  constructor(message: string, position: number) {
    super(`${message} at position ${position}`);
    this.name = "TemplateSyntaxError";
    this.position = position;
  }
}

export class JupyterLabRequestError extends Error {
  status: number;
  url: string;
  constructor(method: string, url: string, status: number, statusText: string) {
    super(`${method} ${url} failed: ${status} ${statusText}`.trimEnd());
    this.name = "JupyterLabRequestError";
    this.status = status;
    this.url = url;
  }
}
