export type ToolResult = {
  content: { type: 'text'; text: string }[];
};

export function jsonResult(value: unknown): ToolResult {
  return {
    content: [
      {
        type: 'text',
        text: JSON.stringify(value, null, 2),
      },
    ],
  };
}
