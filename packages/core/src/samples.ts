/** Example questions for the bundled banking database. */
export const SAMPLE_QUESTIONS: readonly string[] = Object.freeze([
  'Show me total deposits last month',
  'What is the average account balance by account type?',
  'Find customers with a balance over 50,000',
  'Show me the top 10 customers by number of transactions',
  'What are the most common transaction categories?',
  'Show loan distribution by type',
  'How many new accounts were opened each month this year?',
]);
