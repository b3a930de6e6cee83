declare module 'json-to-pretty-yaml' {
  const YAML: {
    stringify(data: unknown): string;
  };
  export default YAML;
}
