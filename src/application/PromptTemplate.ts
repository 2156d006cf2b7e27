export function buildAnswerPrompt(question: string, context: string): string {
  return `You are an expert document analyst. Answer the user's question using the provided context from multiple documents.

CONTEXT INFORMATION:
${context}

USER QUESTION: ${question}

INSTRUCTIONS:
1. Base the answer on all relevant information in the context
2. When the question spans several documents, synthesize information across them
3. Include specific details and examples when available
4. If information is incomplete, state which parts are missing
5. Cite the document name, and page or section where given, for each point
6. Structure the answer with main points and supporting details

ANSWER:`;
}
