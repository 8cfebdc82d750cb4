// Standard text response structure for tool handlers
export function createTextResponse(text: string, isError: boolean = false) {
    return {
        content: [{ type: "text" as const, text }],
        isError
    };
}
