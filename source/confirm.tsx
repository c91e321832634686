import React from 'react';
import {render} from 'ink';
import ConfirmDialog from './components/ConfirmDialog.tsx';

export interface ConfirmRequest {
	title: string;
	message: string;
	detail?: string;
}

export type ConfirmPrompt = (request: ConfirmRequest) => Promise<boolean>;

/**
 * Render a y/N dialog and resolve with the answer once a key is pressed.
 * Needs a TTY on stdin; callers check that first.
 */
export const confirmInTerminal: ConfirmPrompt = ({title, message, detail}) =>
	new Promise(resolve => {
		let answered = false;

		const finish = (confirmed: boolean) => {
			if (answered) return;
			answered = true;
			instance.unmount();
			resolve(confirmed);
		};

		const instance = render(
			<ConfirmDialog
				title={title}
				message={message}
				detail={detail}
				onConfirm={() => finish(true)}
				onCancel={() => finish(false)}
			/>,
			{exitOnCtrlC: false},
		);
	});
