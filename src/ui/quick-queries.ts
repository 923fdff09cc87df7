/** Canned questions offered before the user types anything. */
export const QUICK_QUERIES = [
  "Show me sales trends for the last 6 months",
  "Who are our top 10 customers?",
  "Analyze product performance for last 3 months",
  "Compare regional sales breakdown",
  "Check inventory for warehouse WH001",
  "Get details for order ORD-12345",
] as const;

export function greeting(displayName: string): string {
  return (
    `Hello ${displayName}! I'm your analytics assistant. I can help you analyze sales data, ` +
    "customer insights, product performance, and more. What would you like to know?"
  );
}
