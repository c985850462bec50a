import { memo } from 'react';

interface TodoEditButtonProps {
  onClick: () => void;
  text: string;
  enabled?: boolean;
}

function TodoEditButton({ onClick, text, enabled = true }: TodoEditButtonProps) {
  return (
    <button
      type="button"
      onClick={onClick}
      disabled={!enabled}
      className="rounded-full bg-indigo-600 px-4 py-2 text-sm font-medium text-white hover:bg-indigo-700 focus:outline-none focus:ring-2 focus:ring-indigo-500 disabled:cursor-not-allowed disabled:bg-gray-400"
    >
      {text}
    </button>
  );
}

export default memo(TodoEditButton);
