export function buildUserPrompt(context: string, question: string): string {
  return `${context}

---

QUESTION: ${question}

Answer using only the articles above and cite them by source name and number.`;
}
