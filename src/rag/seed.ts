// Loaded into a fresh index so questions work before any upload.
export const EXAMPLE_KNOWLEDGE_BASE: readonly string[] = [
	'docqa answers questions about uploaded PDF documents using retrieval-augmented generation.',
	'Retrieval-augmented generation retrieves relevant passages first and then asks a language model to answer from them.',
	'Documents are split into overlapping chunks of about 500 words before they are embedded.',
	'Embeddings are vectors that place texts with similar meaning close to each other.',
	'Cosine similarity compares two embeddings; scores above 0.7 usually mean the passage is on topic.',
];
