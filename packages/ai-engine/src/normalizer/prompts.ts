export function buildExtractionPrompt(query: string): string {
  return [
    'Extract the automobile part type, automobile part model, vehicle model, and price range from the following query:',
    '',
    `Query: "${query}"`,
    '',
    'Respond in JSON format with keys: part_type, vehicle_model, price_range (as a list of two numbers).',
  ].join('\n');
}

export function buildRefinePrompt(query: string): string {
  return [
    'Rewrite the following automobile part request as a short search query for an online parts store.',
    'Keep the part name, the part model and the vehicle model. Reply with the search query only.',
    '',
    `Request: "${query}"`,
  ].join('\n');
}
