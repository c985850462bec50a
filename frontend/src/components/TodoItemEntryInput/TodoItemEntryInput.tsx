import { useState } from 'react';
import TodoItemInput from '@components/TodoItemInput';
import TodoEditButton from '@components/TodoEditButton';
import type { TodoDraft, TodoIcon } from '@modules/types';
import { isBlank } from '@reducers';

interface Props {
  onItemComplete: (draft: TodoDraft) => void;
}

// Holds the draft text and icon until submit, then hands them up and resets.
export default function TodoItemEntryInput({ onItemComplete }: Props) {
  const [text, setText] = useState('');
  const [icon, setIcon] = useState<TodoIcon>('default');
  const canSubmit = !isBlank(text);

  function submit() {
    if (!canSubmit) return;
    onItemComplete({ task: text, icon });
    setIcon('default');
    setText('');
  }

  return (
    <TodoItemInput
      text={text}
      onTextChange={setText}
      icon={icon}
      onIconChange={setIcon}
      submit={submit}
      iconsVisible={canSubmit}
    >
      <TodoEditButton onClick={submit} text="Add" enabled={canSubmit} />
    </TodoItemInput>
  );
}
