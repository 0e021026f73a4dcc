export interface FewShotExample {
  question: string;
  query: string;
}

// Order matters: examples are replayed into every prompt as-is.
export const FEW_SHOT_EXAMPLES: readonly FewShotExample[] = [
  {
    question: 'Which customers are from Brazil?',
    query: "SELECT FirstName, LastName, Country FROM customers WHERE Country = 'Brazil';",
  },
  {
    question: "What are the names of all tracks in the 'Rock' genre?",
    query: `SELECT t.Name FROM tracks t
JOIN genres g ON t.GenreId = g.GenreId
WHERE g.Name = 'Rock'
LIMIT 10;`,
  },
  {
    question: 'What are the top 5 most expensive tracks?',
    query: 'SELECT Name, UnitPrice FROM tracks ORDER BY UnitPrice DESC LIMIT 5;',
  },
  {
    question: 'How many customers are there in total?',
    query: 'SELECT COUNT(*) as total_customers FROM customers;',
  },
  {
    question: "What are the names of all albums by the artist 'AC/DC'?",
    query: `SELECT al.Title FROM albums al
JOIN artists ar ON al.ArtistId = ar.ArtistId
WHERE ar.Name = 'AC/DC';`,
  },
];
