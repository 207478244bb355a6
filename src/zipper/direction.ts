/** Direction of motion, relative to the order of the source sequence. */
export type SequenceDirection = "Original" | "Reverse";

export const SequenceDirection = {
	Original: "Original",
	Reverse: "Reverse",
} as const satisfies Record<SequenceDirection, SequenceDirection>;

