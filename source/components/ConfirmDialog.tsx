import React from 'react';
import {Box, Text, useInput} from 'ink';

interface Props {
	title: string;
	message: string;
	detail?: string;
	onConfirm: () => void;
	onCancel: () => void;
}

// Defaults to "no": only an explicit y confirms
export default function ConfirmDialog({
	title,
	message,
	detail,
	onConfirm,
	onCancel,
}: Props) {
	useInput((input, key) => {
		if (input === 'y' || input === 'Y') {
			onConfirm();
		} else if (
			key.return ||
			key.escape ||
			input === 'n' ||
			input === 'N' ||
			(key.ctrl && input === 'c')
		) {
			onCancel();
		}
	});

	return (
		<Box
			flexDirection="column"
			borderStyle="round"
			borderColor="yellow"
			paddingX={2}
		>
			<Text bold color="yellow">
				{title}
			</Text>
			<Text>{message}</Text>
			{detail && <Text dimColor>{detail}</Text>}
			<Text dimColor>
				Press <Text color="green">y</Text> to confirm,{' '}
				<Text color="yellow">n</Text>, <Text color="yellow">Esc</Text> or{' '}
				<Text color="yellow">Enter</Text> to cancel
			</Text>
		</Box>
	);
}
